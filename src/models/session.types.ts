// src/models/session.types.ts
import { z } from 'zod';

export type SessionStatus = 'OPEN' | 'CLOSED';

/**
 * One scheduled attendance-taking window, bound to a single classroom segment.
 */
export interface AttendanceSession {
  id: number;
  classroomSegment: string;
  label: string | null;
  status: SessionStatus;
  startsAt: Date | null;
  endsAt: Date | null;
  createdAt: Date;
  closedAt: Date | null;
}

export interface CreateSessionInput {
  classroomSegment: string;
  label: string | null;
  startsAt: Date | null;
  endsAt: Date | null;
}

export const createSessionSchema = z
  .object({
    classroomSegment: z.string().trim().min(1, 'classroomSegment must be a non-empty network prefix'),
    label: z.string().trim().min(1).max(120).optional(),
    startsAt: z.string().datetime({ offset: true }).optional(),
    endsAt: z.string().datetime({ offset: true }).optional(),
  })
  .refine((body) => !body.startsAt || !body.endsAt || new Date(body.startsAt) < new Date(body.endsAt), {
    message: 'endsAt must be later than startsAt',
    path: ['endsAt'],
  });

export type CreateSessionPayload = z.infer<typeof createSessionSchema>;

export const listSessionsQuerySchema = z.object({
  status: z.enum(['OPEN', 'CLOSED']).optional(),
});
