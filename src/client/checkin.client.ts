// src/client/checkin.client.ts
// Helper for front ends that submit check-ins. Keeps off-network, not-found and service faults
// apart so each can be shown differently.

export interface CheckInSubmission {
  deviceIdentifier: string;
  sessionId: number;
}

export type CheckInResult =
  | { status: 'accepted'; student: string; classroomSegment: string; checkedInAt: string }
  | { status: 'already-recorded'; student: string; classroomSegment: string; checkedInAt: string }
  | { status: 'off-network'; message: string }
  | { status: 'session-not-found'; message: string }
  | { status: 'invalid-request'; message: string }
  | { status: 'unavailable'; message: string }
  | { status: 'unexpected'; httpStatus: number; message: string };

const RETRY_MESSAGE = 'Something went wrong. Please try again.';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stringField = (body: Record<string, unknown>, key: string): string | null => {
  const value = body[key];
  return typeof value === 'string' ? value : null;
};

/**
 * Maps an HTTP status and decoded JSON body from POST /api/attendance/check-in onto a result.
 * A body that does not match its status is reported as unexpected.
 */
export const interpretCheckInResponse = (httpStatus: number, body: unknown): CheckInResult => {
  const payload = isRecord(body) ? body : {};
  const outcome = stringField(payload, 'outcome');
  const message = stringField(payload, 'message');
  const student = stringField(payload, 'student');
  const classroomSegment = stringField(payload, 'classroomSegment');

  if (httpStatus === 201 && outcome === 'ACCEPTED') {
    const checkedInAt = stringField(payload, 'checkedInAt');
    if (student !== null && classroomSegment !== null && checkedInAt !== null) {
      return { status: 'accepted', student, classroomSegment, checkedInAt };
    }
  }
  if (httpStatus === 200 && outcome === 'ALREADY_RECORDED') {
    const checkedInAt = stringField(payload, 'originalCheckedInAt');
    if (student !== null && classroomSegment !== null && checkedInAt !== null) {
      return { status: 'already-recorded', student, classroomSegment, checkedInAt };
    }
  }
  if (httpStatus === 403 && outcome === 'OFF_NETWORK') {
    return { status: 'off-network', message: message ?? 'You must be on classroom Wi-Fi' };
  }
  if (httpStatus === 404 && outcome === 'SESSION_NOT_FOUND') {
    return { status: 'session-not-found', message: message ?? 'Session not found.' };
  }
  if (httpStatus === 400) {
    return { status: 'invalid-request', message: message ?? 'The check-in request was malformed.' };
  }
  if (httpStatus === 503) {
    return { status: 'unavailable', message: message ?? RETRY_MESSAGE };
  }
  return { status: 'unexpected', httpStatus, message: message ?? `Unexpected response (${httpStatus}).` };
};

/**
 * Submits a check-in. Network failures and unreadable bodies come back as results, not throws.
 */
export const submitCheckIn = async (
  baseUrl: string,
  token: string,
  submission: CheckInSubmission,
  fetchImpl: typeof fetch = fetch
): Promise<CheckInResult> => {
  let response: Response;
  try {
    response = await fetchImpl(`${baseUrl.replace(/\/+$/, '')}/api/attendance/check-in`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${token}`,
      },
      body: JSON.stringify(submission),
    });
  } catch {
    return { status: 'unavailable', message: RETRY_MESSAGE };
  }

  let body: unknown = null;
  try {
    body = await response.json();
  } catch {
    body = null;
  }
  return interpretCheckInResponse(response.status, body);
};
