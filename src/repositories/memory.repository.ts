// src/repositories/memory.repository.ts
// In-process stores for local runs and tests. Every mutation completes synchronously before the
// returned promise settles, so check-and-set sequences cannot interleave.
import { randomUUID } from 'crypto';
import { AttendanceSession, CreateSessionInput, SessionStatus } from '@/models/session.types';
import { DeviceAttachment } from '@/models/network.types';
import { DeviceRegistration } from '@/models/device.types';
import { AttendanceRecord, InsertResult, NewAttendanceRecord } from '@/models/attendance.types';
import { AttachmentStore, AttendanceStore, DeviceRegistryStore, SessionStore, Stores } from '@/repositories/types';

const copySession = (session: AttendanceSession): AttendanceSession => ({ ...session });
const copyRecord = (record: AttendanceRecord): AttendanceRecord => ({ ...record });

export class MemorySessionStore implements SessionStore {
  private sessions = new Map<number, AttendanceSession>();
  private nextId = 1;

  async findById(sessionId: number): Promise<AttendanceSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? copySession(session) : null;
  }

  async list(filter: { status?: SessionStatus }): Promise<AttendanceSession[]> {
    return [...this.sessions.values()]
      .filter((session) => !filter.status || session.status === filter.status)
      .sort((a, b) => a.id - b.id)
      .map(copySession);
  }

  async create(input: CreateSessionInput): Promise<AttendanceSession> {
    const session: AttendanceSession = {
      id: this.nextId++,
      classroomSegment: input.classroomSegment,
      label: input.label,
      status: 'OPEN',
      startsAt: input.startsAt,
      endsAt: input.endsAt,
      createdAt: new Date(),
      closedAt: null,
    };
    this.sessions.set(session.id, session);
    return copySession(session);
  }

  async close(sessionId: number, closedAt: Date): Promise<AttendanceSession | null> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    if (session.status === 'OPEN') {
      session.status = 'CLOSED';
      session.closedAt = closedAt;
    }
    return copySession(session);
  }

  clear(): void {
    this.sessions.clear();
    this.nextId = 1;
  }
}

export class MemoryAttachmentStore implements AttachmentStore {
  private attachments = new Map<string, DeviceAttachment>();

  async findByDevice(deviceIdentifier: string): Promise<DeviceAttachment | null> {
    const attachment = this.attachments.get(deviceIdentifier);
    return attachment ? { ...attachment } : null;
  }

  async upsertMany(attachments: DeviceAttachment[]): Promise<number> {
    for (const attachment of attachments) {
      this.attachments.set(attachment.deviceIdentifier, { ...attachment });
    }
    return attachments.length;
  }

  async remove(deviceIdentifier: string): Promise<boolean> {
    return this.attachments.delete(deviceIdentifier);
  }

  clear(): void {
    this.attachments.clear();
  }
}

export class MemoryDeviceRegistryStore implements DeviceRegistryStore {
  private registrations = new Map<string, DeviceRegistration>();

  async findByDevice(deviceIdentifier: string): Promise<DeviceRegistration | null> {
    const registration = this.registrations.get(deviceIdentifier);
    return registration ? { ...registration } : null;
  }

  async list(filter: { studentId?: string }): Promise<DeviceRegistration[]> {
    return [...this.registrations.values()]
      .filter((registration) => !filter.studentId || registration.studentId === filter.studentId)
      .sort((a, b) => a.deviceIdentifier.localeCompare(b.deviceIdentifier))
      .map((registration) => ({ ...registration }));
  }

  async register(registration: DeviceRegistration): Promise<DeviceRegistration> {
    this.registrations.set(registration.deviceIdentifier, { ...registration });
    return { ...registration };
  }

  async remove(deviceIdentifier: string): Promise<boolean> {
    return this.registrations.delete(deviceIdentifier);
  }

  clear(): void {
    this.registrations.clear();
  }
}

export class MemoryAttendanceStore implements AttendanceStore {
  private records = new Map<string, AttendanceRecord>();

  private static keyOf(studentId: string, sessionId: number): string {
    return `${sessionId}:${studentId}`;
  }

  async insertIfAbsent(input: NewAttendanceRecord): Promise<InsertResult> {
    const key = MemoryAttendanceStore.keyOf(input.studentId, input.sessionId);
    const existing = this.records.get(key);
    if (existing) {
      return { created: false, record: copyRecord(existing) };
    }
    const record: AttendanceRecord = { id: randomUUID(), ...input };
    this.records.set(key, record);
    return { created: true, record: copyRecord(record) };
  }

  async listBySession(sessionId: number): Promise<AttendanceRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.sessionId === sessionId)
      .sort((a, b) => a.checkedInAt.getTime() - b.checkedInAt.getTime())
      .map(copyRecord);
  }

  async listByStudent(studentId: string): Promise<AttendanceRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.studentId === studentId)
      .sort((a, b) => b.checkedInAt.getTime() - a.checkedInAt.getTime())
      .map(copyRecord);
  }

  clear(): void {
    this.records.clear();
  }
}

export interface MemoryStores extends Stores {
  sessions: MemorySessionStore;
  attachments: MemoryAttachmentStore;
  devices: MemoryDeviceRegistryStore;
  attendance: MemoryAttendanceStore;
  clear(): void;
}

export const createMemoryStores = (): MemoryStores => {
  const sessions = new MemorySessionStore();
  const attachments = new MemoryAttachmentStore();
  const devices = new MemoryDeviceRegistryStore();
  const attendance = new MemoryAttendanceStore();
  return {
    sessions,
    attachments,
    devices,
    attendance,
    clear() {
      sessions.clear();
      attachments.clear();
      devices.clear();
      attendance.clear();
    },
  };
};
