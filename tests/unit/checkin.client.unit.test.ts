import { interpretCheckInResponse, submitCheckIn } from '@/client/checkin.client';

describe('interpretCheckInResponse', () => {
  it('reads an accepted check-in', () => {
    const result = interpretCheckInResponse(201, {
      protocolVersion: 1,
      outcome: 'ACCEPTED',
      student: 'alice',
      classroomSegment: '10.0.5.',
      checkedInAt: '2026-03-02T09:00:00.000Z',
    });

    expect(result).toEqual({
      status: 'accepted',
      student: 'alice',
      classroomSegment: '10.0.5.',
      checkedInAt: '2026-03-02T09:00:00.000Z',
    });
  });

  it('reads a repeat check-in with its original timestamp', () => {
    const result = interpretCheckInResponse(200, {
      outcome: 'ALREADY_RECORDED',
      student: 'alice',
      classroomSegment: '10.0.5.',
      originalCheckedInAt: '2026-03-02T09:00:00.000Z',
    });

    expect(result).toEqual({
      status: 'already-recorded',
      student: 'alice',
      classroomSegment: '10.0.5.',
      checkedInAt: '2026-03-02T09:00:00.000Z',
    });
  });

  it('keeps off-network, not-found and unavailable apart', () => {
    expect(interpretCheckInResponse(403, { outcome: 'OFF_NETWORK', message: 'You must be on classroom Wi-Fi' })).toEqual({
      status: 'off-network',
      message: 'You must be on classroom Wi-Fi',
    });
    expect(interpretCheckInResponse(404, { outcome: 'SESSION_NOT_FOUND', message: 'Session 9 not found.' })).toEqual({
      status: 'session-not-found',
      message: 'Session 9 not found.',
    });
    expect(interpretCheckInResponse(503, { error: 'SERVICE_UNAVAILABLE' })).toEqual({
      status: 'unavailable',
      message: 'Something went wrong. Please try again.',
    });
  });

  it('does not mistake a bare 403 or 404 for a business outcome', () => {
    expect(interpretCheckInResponse(403, { message: 'Access denied. Insufficient permissions.' })).toEqual({
      status: 'unexpected',
      httpStatus: 403,
      message: 'Access denied. Insufficient permissions.',
    });
    expect(interpretCheckInResponse(404, null)).toEqual({
      status: 'unexpected',
      httpStatus: 404,
      message: 'Unexpected response (404).',
    });
  });

  it('reports malformed requests', () => {
    expect(interpretCheckInResponse(400, { error: 'INVALID_ARGUMENT', message: 'sessionId must be a positive integer' })).toEqual({
      status: 'invalid-request',
      message: 'sessionId must be a positive integer',
    });
  });
});

describe('submitCheckIn', () => {
  it('posts the submission with the bearer token and interprets the reply', async () => {
    const fetchImpl = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>().mockResolvedValue(
      new Response(JSON.stringify({ outcome: 'OFF_NETWORK', message: 'You must be on classroom Wi-Fi' }), { status: 403 })
    );

    const result = await submitCheckIn('http://attendance.test/', 'test-token', { deviceIdentifier: 'AA:BB:CC:DD:EE:FF', sessionId: 1 }, fetchImpl);

    expect(result).toEqual({ status: 'off-network', message: 'You must be on classroom Wi-Fi' });
    expect(fetchImpl).toHaveBeenCalledWith('http://attendance.test/api/attendance/check-in', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
      body: JSON.stringify({ deviceIdentifier: 'AA:BB:CC:DD:EE:FF', sessionId: 1 }),
    });
  });

  it('turns a transport failure into an unavailable result', async () => {
    const fetchImpl = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>().mockRejectedValue(new TypeError('fetch failed'));

    await expect(submitCheckIn('http://attendance.test', 'test-token', { deviceIdentifier: 'AA:BB:CC:DD:EE:FF', sessionId: 1 }, fetchImpl)).resolves.toEqual({
      status: 'unavailable',
      message: 'Something went wrong. Please try again.',
    });
  });
});
