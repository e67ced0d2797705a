// src/services/outcome.encoder.ts
import { InfrastructureError, InvalidArgumentError, NotFoundError } from '@/lib/errors';
import { CheckInOutcome, CheckInPayload, EncodedResponse, FaultPayload } from '@/models/attendance.types';

// Bump when any row of the mapping below changes.
export const CHECK_IN_PROTOCOL_VERSION = 1;
export const PROTOCOL_HEADER = 'X-Checkin-Protocol';

export const OFF_NETWORK_REASON = 'You must be on classroom Wi-Fi';
export const UNAVAILABLE_MESSAGE = 'Attendance service is temporarily unavailable. Please try again.';
export const INTERNAL_ERROR_MESSAGE = 'Internal Server Error';

export const encode = (outcome: CheckInOutcome): EncodedResponse<CheckInPayload> => {
  const protocolVersion = CHECK_IN_PROTOCOL_VERSION;

  switch (outcome.kind) {
    case 'ACCEPTED':
      return {
        statusCode: 201,
        payload: {
          protocolVersion,
          outcome: 'ACCEPTED',
          student: outcome.record.studentId,
          classroomSegment: outcome.classroomSegment,
          checkedInAt: outcome.record.checkedInAt.toISOString(),
        },
      };
    case 'ALREADY_RECORDED':
      return {
        statusCode: 200,
        payload: {
          protocolVersion,
          outcome: 'ALREADY_RECORDED',
          student: outcome.record.studentId,
          classroomSegment: outcome.classroomSegment,
          originalCheckedInAt: outcome.record.checkedInAt.toISOString(),
        },
      };
    case 'OFF_NETWORK':
      return {
        statusCode: 403,
        payload: { protocolVersion, outcome: 'OFF_NETWORK', message: OFF_NETWORK_REASON },
      };
    case 'SESSION_NOT_FOUND':
      return {
        statusCode: 404,
        payload: {
          protocolVersion,
          outcome: 'SESSION_NOT_FOUND',
          message: `Session ${outcome.sessionId} not found.`,
        },
      };
  }
};

/**
 * Encodes anything thrown below the HTTP layer. Precondition faults keep their message;
 * infrastructure faults get a generic retry message; anything else is an unhandled fault.
 */
export const encodeFault = (error: unknown): EncodedResponse<FaultPayload> => {
  const protocolVersion = CHECK_IN_PROTOCOL_VERSION;

  if (error instanceof InvalidArgumentError) {
    return {
      statusCode: 400,
      payload: { protocolVersion, error: 'INVALID_ARGUMENT', message: error.message },
    };
  }
  if (error instanceof InfrastructureError) {
    return {
      statusCode: 503,
      payload: { protocolVersion, error: 'SERVICE_UNAVAILABLE', message: UNAVAILABLE_MESSAGE },
    };
  }
  if (error instanceof NotFoundError) {
    return {
      statusCode: 404,
      payload: { protocolVersion, error: 'NOT_FOUND', message: error.message },
    };
  }
  return {
    statusCode: 500,
    payload: { protocolVersion, error: 'INTERNAL_ERROR', message: INTERNAL_ERROR_MESSAGE },
  };
};
