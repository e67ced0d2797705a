import { InfrastructureError, InvalidArgumentError, InvalidIdentifierError, NotFoundError } from '@/lib/errors';
import { AttendanceRecord } from '@/models/attendance.types';
import { OFF_NETWORK_REASON, UNAVAILABLE_MESSAGE, encode, encodeFault } from '@/services/outcome.encoder';

const record: AttendanceRecord = {
  id: 'rec-1',
  studentId: 'alice',
  sessionId: 1,
  deviceIdentifier: 'AA:BB:CC:DD:EE:FF',
  networkAddress: '10.0.5.23',
  checkedInAt: new Date('2026-03-02T09:00:00.000Z'),
};

describe('encode', () => {
  it('maps Accepted to 201 with the student and classroom segment', () => {
    expect(encode({ kind: 'ACCEPTED', record, classroomSegment: '10.0.5.' })).toEqual({
      statusCode: 201,
      payload: {
        protocolVersion: 1,
        outcome: 'ACCEPTED',
        student: 'alice',
        classroomSegment: '10.0.5.',
        checkedInAt: '2026-03-02T09:00:00.000Z',
      },
    });
  });

  it('maps AlreadyRecorded to 200 with the original timestamp', () => {
    expect(encode({ kind: 'ALREADY_RECORDED', record, classroomSegment: '10.0.5.' })).toEqual({
      statusCode: 200,
      payload: {
        protocolVersion: 1,
        outcome: 'ALREADY_RECORDED',
        student: 'alice',
        classroomSegment: '10.0.5.',
        originalCheckedInAt: '2026-03-02T09:00:00.000Z',
      },
    });
  });

  it('maps OffNetwork to 403 with the fixed reason', () => {
    expect(encode({ kind: 'OFF_NETWORK', sessionId: 1 })).toEqual({
      statusCode: 403,
      payload: { protocolVersion: 1, outcome: 'OFF_NETWORK', message: 'You must be on classroom Wi-Fi' },
    });
    expect(OFF_NETWORK_REASON).toBe('You must be on classroom Wi-Fi');
  });

  it('maps SessionNotFound to 404 naming the session', () => {
    expect(encode({ kind: 'SESSION_NOT_FOUND', sessionId: 999 })).toEqual({
      statusCode: 404,
      payload: { protocolVersion: 1, outcome: 'SESSION_NOT_FOUND', message: 'Session 999 not found.' },
    });
  });
});

describe('encodeFault', () => {
  it('maps precondition faults to 400 with the violated constraint', () => {
    expect(encodeFault(new InvalidArgumentError('sessionId must be a positive integer'))).toEqual({
      statusCode: 400,
      payload: { protocolVersion: 1, error: 'INVALID_ARGUMENT', message: 'sessionId must be a positive integer' },
    });
    expect(encodeFault(new InvalidIdentifierError('bad mac')).statusCode).toBe(400);
  });

  it('maps infrastructure faults to 503 without leaking the cause', () => {
    const fault = new InfrastructureError('attendance store', 'attendance store is unavailable', new Error('ECONNREFUSED'));

    expect(encodeFault(fault)).toEqual({
      statusCode: 503,
      payload: { protocolVersion: 1, error: 'SERVICE_UNAVAILABLE', message: UNAVAILABLE_MESSAGE },
    });
  });

  it('maps not-found errors from the scheduling routes to 404', () => {
    expect(encodeFault(new NotFoundError('Session 4 not found.'))).toEqual({
      statusCode: 404,
      payload: { protocolVersion: 1, error: 'NOT_FOUND', message: 'Session 4 not found.' },
    });
  });

  it('maps anything else to a distinct 500', () => {
    expect(encodeFault(new TypeError('x is undefined'))).toEqual({
      statusCode: 500,
      payload: { protocolVersion: 1, error: 'INTERNAL_ERROR', message: 'Internal Server Error' },
    });
  });
});
