// src/controllers/session.controller.ts
// Scheduling side: instructors open and close attendance sessions. The check-in path only reads them.
import { Request, Response, NextFunction } from 'express';
import { assertValidSessionId } from '@/lib/device.utils';
import { NotFoundError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { stores } from '@/lib/stores';
import { parseInput } from '@/lib/validation';
import { AttendanceSession, createSessionSchema, listSessionsQuerySchema } from '@/models/session.types';
import { isSessionOpen } from '@/services/session.registry';

const serializeSession = (session: AttendanceSession, now: Date = new Date()) => ({
  id: session.id,
  classroomSegment: session.classroomSegment,
  label: session.label,
  status: session.status,
  acceptingCheckIns: isSessionOpen(session, now),
  startsAt: session.startsAt ? session.startsAt.toISOString() : null,
  endsAt: session.endsAt ? session.endsAt.toISOString() : null,
  createdAt: session.createdAt.toISOString(),
  closedAt: session.closedAt ? session.closedAt.toISOString() : null,
});

// POST /sessions
export const createSession = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = parseInput(createSessionSchema, req.body);

    const session = await stores.sessions.create({
      classroomSegment: body.classroomSegment,
      label: body.label ?? null,
      startsAt: body.startsAt ? new Date(body.startsAt) : null,
      endsAt: body.endsAt ? new Date(body.endsAt) : null,
    });

    logger.info('Sessions', `Session ${session.id} opened on segment ${session.classroomSegment}`);
    return res.status(201).json(serializeSession(session));
  } catch (error) {
    return next(error);
  }
};

// GET /sessions?status=OPEN|CLOSED
export const listSessions = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { status } = parseInput(listSessionsQuerySchema, req.query);
    const sessions = await stores.sessions.list({ status });
    const now = new Date();
    return res.status(200).json(sessions.map((session) => serializeSession(session, now)));
  } catch (error) {
    return next(error);
  }
};

// GET /sessions/:sessionId
export const getSession = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessionId = assertValidSessionId(Number(req.params.sessionId));
    const session = await stores.sessions.findById(sessionId);
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found.`);
    }
    return res.status(200).json(serializeSession(session));
  } catch (error) {
    return next(error);
  }
};

// PATCH /sessions/:sessionId/close
export const closeSession = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessionId = assertValidSessionId(Number(req.params.sessionId));
    const session = await stores.sessions.close(sessionId, new Date());
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found.`);
    }

    logger.info('Sessions', `Session ${sessionId} closed`);
    return res.status(200).json(serializeSession(session));
  } catch (error) {
    return next(error);
  }
};
