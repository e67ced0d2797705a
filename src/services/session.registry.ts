// src/services/session.registry.ts
import { assertValidSessionId } from '@/lib/device.utils';
import { isWithinWindow, withDeadline } from '@/lib/time.utils';
import { AttendanceSession } from '@/models/session.types';
import { SessionStore } from '@/repositories/types';

export type SessionLookup = { found: true; session: AttendanceSession } | { found: false };

/**
 * Read-only view of scheduled sessions for the check-in path.
 */
export class SessionRegistry {
  constructor(
    private readonly sessions: SessionStore,
    private readonly lookupTimeoutMs: number
  ) {}

  async find(sessionId: number): Promise<SessionLookup> {
    assertValidSessionId(sessionId);
    const session = await withDeadline(this.sessions.findById(sessionId), this.lookupTimeoutMs, 'session registry');
    return session ? { found: true, session } : { found: false };
  }
}

export const isSessionOpen = (session: AttendanceSession, now: Date): boolean =>
  session.status === 'OPEN' && isWithinWindow(now, session.startsAt, session.endsAt);
