// src/services/checkin.validator.ts
import { assertValidSessionId, matchesSegment, normalizeDeviceIdentifier } from '@/lib/device.utils';
import { InvalidArgumentError } from '@/lib/errors';
import { withDeadline } from '@/lib/time.utils';
import { CheckInOutcome } from '@/models/attendance.types';
import { AttendanceStore, DeviceRegistryStore } from '@/repositories/types';
import { NetworkPresenceResolver } from '@/services/presence.resolver';
import { SessionRegistry, isSessionOpen } from '@/services/session.registry';

export interface CheckInValidatorDeps {
  registry: SessionRegistry;
  resolver: NetworkPresenceResolver;
  devices: DeviceRegistryStore;
  attendance: AttendanceStore;
  lookupTimeoutMs: number;
  writeTimeoutMs: number;
  now?: () => Date;
}

export class CheckInValidator {
  private readonly now: () => Date;

  constructor(private readonly deps: CheckInValidatorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Decides one check-in. Rules apply in order and the first match wins:
   * unknown or closed session, then network presence, then the existing record, then creation.
   * A device that is present but not registered to `claimedStudent` counts as off-network.
   *
   * Preconditions are checked before any lookup and raise InvalidArgumentError. Dependency faults
   * propagate unchanged.
   */
  async validate(deviceIdentifier: string, sessionId: number, claimedStudent: string): Promise<CheckInOutcome> {
    const device = normalizeDeviceIdentifier(deviceIdentifier);
    assertValidSessionId(sessionId);
    if (typeof claimedStudent !== 'string' || claimedStudent.trim().length === 0) {
      throw new InvalidArgumentError('student identity is required');
    }

    const lookup = await this.deps.registry.find(sessionId);
    // Closed sessions look exactly like missing ones from the outside.
    if (!lookup.found || !isSessionOpen(lookup.session, this.now())) {
      return { kind: 'SESSION_NOT_FOUND', sessionId };
    }
    const { session } = lookup;

    const presence = await this.deps.resolver.resolve(device);
    if (!presence.attached || !matchesSegment(presence.networkAddress, session.classroomSegment)) {
      return { kind: 'OFF_NETWORK', sessionId };
    }

    const registration = await withDeadline(
      this.deps.devices.findByDevice(device),
      this.deps.lookupTimeoutMs,
      'device registry'
    );
    if (!registration || registration.studentId !== claimedStudent) {
      return { kind: 'OFF_NETWORK', sessionId };
    }

    const { created, record } = await withDeadline(
      this.deps.attendance.insertIfAbsent({
        studentId: claimedStudent,
        sessionId,
        deviceIdentifier: device,
        networkAddress: presence.networkAddress,
        checkedInAt: this.now(),
      }),
      this.deps.writeTimeoutMs,
      'attendance store'
    );

    return created
      ? { kind: 'ACCEPTED', record, classroomSegment: session.classroomSegment }
      : { kind: 'ALREADY_RECORDED', record, classroomSegment: session.classroomSegment };
  }
}
