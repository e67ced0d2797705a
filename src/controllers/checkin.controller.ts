// src/controllers/checkin.controller.ts
import { Request, Response, NextFunction } from 'express';
import { assertValidSessionId } from '@/lib/device.utils';
import { logger } from '@/lib/logger';
import { stores } from '@/lib/stores';
import { parseInput } from '@/lib/validation';
import { AttendanceRecord, checkInRequestSchema } from '@/models/attendance.types';
import { checkInValidator } from '@/services';
import { CHECK_IN_PROTOCOL_VERSION, PROTOCOL_HEADER, encode } from '@/services/outcome.encoder';

const serializeRecord = (record: AttendanceRecord) => ({
  id: record.id,
  studentId: record.studentId,
  sessionId: record.sessionId,
  deviceIdentifier: record.deviceIdentifier,
  networkAddress: record.networkAddress,
  checkedInAt: record.checkedInAt.toISOString(),
});

// POST /attendance/check-in - Student self check-in, credited only from the classroom network
export const checkIn = async (req: Request, res: Response, next: NextFunction) => {
  try {
    if (!req.user) {
      return res.status(401).json({ message: 'Authentication required.' });
    }

    const { deviceIdentifier, sessionId } = parseInput(checkInRequestSchema, req.body);
    // The student is whoever holds the token, never a field in the body.
    const outcome = await checkInValidator.validate(deviceIdentifier, sessionId, req.user.id);

    logger.info('CheckIn', `${outcome.kind} for student ${req.user.id} on session ${sessionId}`);

    const { statusCode, payload } = encode(outcome);
    res.setHeader(PROTOCOL_HEADER, String(CHECK_IN_PROTOCOL_VERSION));
    return res.status(statusCode).json(payload);
  } catch (error) {
    return next(error);
  }
};

// GET /attendance/me - The caller's own attendance history, newest first
export const getMyAttendance = async (req: Request, res: Response, next: NextFunction) => {
  try {
    if (!req.user) {
      return res.status(401).json({ message: 'Authentication required.' });
    }

    const records = await stores.attendance.listByStudent(req.user.id);
    return res.status(200).json(records.map(serializeRecord));
  } catch (error) {
    return next(error);
  }
};

// GET /attendance/sessions/:sessionId - All check-ins for a session, in arrival order
export const getSessionAttendance = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessionId = assertValidSessionId(Number(req.params.sessionId));

    const session = await stores.sessions.findById(sessionId);
    if (!session) {
      return res.status(404).json({ message: `Session ${sessionId} not found.` });
    }

    const records = await stores.attendance.listBySession(sessionId);
    return res.status(200).json({
      sessionId,
      classroomSegment: session.classroomSegment,
      count: records.length,
      records: records.map(serializeRecord),
    });
  } catch (error) {
    return next(error);
  }
};
