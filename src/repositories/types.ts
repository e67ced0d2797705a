// src/repositories/types.ts
import { AttendanceSession, CreateSessionInput, SessionStatus } from '@/models/session.types';
import { DeviceAttachment } from '@/models/network.types';
import { DeviceRegistration } from '@/models/device.types';
import { AttendanceRecord, InsertResult, NewAttendanceRecord } from '@/models/attendance.types';

/**
 * Sessions are written by the scheduling side only; the check-in path reads through findById.
 */
export interface SessionStore {
  findById(sessionId: number): Promise<AttendanceSession | null>;
  list(filter: { status?: SessionStatus }): Promise<AttendanceSession[]>;
  create(input: CreateSessionInput): Promise<AttendanceSession>;
  /** Returns null when no such session exists. Closing a closed session keeps its closedAt. */
  close(sessionId: number, closedAt: Date): Promise<AttendanceSession | null>;
}

export interface AttachmentStore {
  findByDevice(deviceIdentifier: string): Promise<DeviceAttachment | null>;
  upsertMany(attachments: DeviceAttachment[]): Promise<number>;
  remove(deviceIdentifier: string): Promise<boolean>;
}

/**
 * Device ownership, written by administrators. Registering a device that already has an owner
 * moves it to the new owner.
 */
export interface DeviceRegistryStore {
  findByDevice(deviceIdentifier: string): Promise<DeviceRegistration | null>;
  list(filter: { studentId?: string }): Promise<DeviceRegistration[]>;
  register(registration: DeviceRegistration): Promise<DeviceRegistration>;
  remove(deviceIdentifier: string): Promise<boolean>;
}

export interface AttendanceStore {
  /**
   * Atomic compare-and-create keyed on (studentId, sessionId). When a record already exists it is
   * returned untouched with `created: false`.
   */
  insertIfAbsent(record: NewAttendanceRecord): Promise<InsertResult>;
  listBySession(sessionId: number): Promise<AttendanceRecord[]>;
  listByStudent(studentId: string): Promise<AttendanceRecord[]>;
}

export interface Stores {
  sessions: SessionStore;
  attachments: AttachmentStore;
  devices: DeviceRegistryStore;
  attendance: AttendanceStore;
}
