// src/models/attendance.types.ts
import { z } from 'zod';

/**
 * One accepted check-in. Exactly one exists per (studentId, sessionId).
 */
export interface AttendanceRecord {
  id: string;
  studentId: string;
  sessionId: number;
  deviceIdentifier: string;
  networkAddress: string;
  checkedInAt: Date;
}

export type NewAttendanceRecord = Omit<AttendanceRecord, 'id'>;

export interface InsertResult {
  created: boolean;
  record: AttendanceRecord;
}

export type CheckInOutcome =
  | { kind: 'ACCEPTED'; record: AttendanceRecord; classroomSegment: string }
  | { kind: 'ALREADY_RECORDED'; record: AttendanceRecord; classroomSegment: string }
  | { kind: 'OFF_NETWORK'; sessionId: number }
  | { kind: 'SESSION_NOT_FOUND'; sessionId: number };

export type CheckInOutcomeKind = CheckInOutcome['kind'];

// Shape only; lexical rules for the identifier and the session id are enforced by the validator.
export const checkInRequestSchema = z.object({
  deviceIdentifier: z.string(),
  sessionId: z.number(),
});

export type CheckInRequest = z.infer<typeof checkInRequestSchema>;

export interface AcceptedPayload {
  protocolVersion: number;
  outcome: 'ACCEPTED';
  student: string;
  classroomSegment: string;
  checkedInAt: string;
}

export interface AlreadyRecordedPayload {
  protocolVersion: number;
  outcome: 'ALREADY_RECORDED';
  student: string;
  classroomSegment: string;
  originalCheckedInAt: string;
}

export interface RejectedPayload {
  protocolVersion: number;
  outcome: 'OFF_NETWORK' | 'SESSION_NOT_FOUND';
  message: string;
}

export type FaultCode = 'INVALID_ARGUMENT' | 'NOT_FOUND' | 'SERVICE_UNAVAILABLE' | 'INTERNAL_ERROR';

export interface FaultPayload {
  protocolVersion: number;
  error: FaultCode;
  message: string;
  stack?: string;
}

export type CheckInPayload = AcceptedPayload | AlreadyRecordedPayload | RejectedPayload;

export interface EncodedResponse<P = CheckInPayload | FaultPayload> {
  statusCode: number;
  payload: P;
}
