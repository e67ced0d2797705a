// src/repositories/mongo.repository.ts
import { mongo } from 'mongoose';
import { AppError, InfrastructureError } from '@/lib/errors';
import { AttendanceSession, CreateSessionInput, SessionStatus } from '@/models/session.types';
import { DeviceAttachment } from '@/models/network.types';
import { DeviceRegistration } from '@/models/device.types';
import { AttendanceRecord, InsertResult, NewAttendanceRecord } from '@/models/attendance.types';
import { CounterModel, ISession, SessionModel } from '@/models/session.model';
import { DeviceAttachmentModel, IDeviceAttachment } from '@/models/attachment.model';
import { AttendanceRecordModel, IAttendanceRecord } from '@/models/attendance.model';
import { DeviceRegistrationModel, IDeviceRegistration } from '@/models/device.model';
import { AttachmentStore, AttendanceStore, DeviceRegistryStore, SessionStore, Stores } from '@/repositories/types';

const SESSION_COUNTER_ID = 'attendanceSession';

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongo.MongoServerError && error.code === 11000;

// Driver failures surface as InfrastructureError naming the store; our own errors pass through.
const guard = async <T>(dependency: string, work: () => Promise<T>): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new InfrastructureError(dependency, `${dependency} is unavailable`, error);
  }
};

const toSession = (doc: ISession): AttendanceSession => ({
  id: doc.sessionId,
  classroomSegment: doc.classroomSegment,
  label: doc.label ?? null,
  status: doc.status,
  startsAt: doc.startsAt ?? null,
  endsAt: doc.endsAt ?? null,
  createdAt: doc.createdAt,
  closedAt: doc.closedAt ?? null,
});

const toAttachment = (doc: IDeviceAttachment): DeviceAttachment => ({
  deviceIdentifier: doc.deviceIdentifier,
  networkAddress: doc.networkAddress,
  observedAt: doc.observedAt,
});

const toRegistration = (doc: IDeviceRegistration): DeviceRegistration => ({
  deviceIdentifier: doc.deviceIdentifier,
  studentId: doc.studentId,
  registeredAt: doc.registeredAt,
});

const toRecord = (doc: IAttendanceRecord & { _id: { toString(): string } }): AttendanceRecord => ({
  id: doc._id.toString(),
  studentId: doc.studentId,
  sessionId: doc.sessionId,
  deviceIdentifier: doc.deviceIdentifier,
  networkAddress: doc.networkAddress,
  checkedInAt: doc.checkedInAt,
});

export class MongoSessionStore implements SessionStore {
  findById(sessionId: number): Promise<AttendanceSession | null> {
    return guard('session registry', async () => {
      const doc = await SessionModel.findOne({ sessionId }).lean();
      return doc ? toSession(doc) : null;
    });
  }

  list(filter: { status?: SessionStatus }): Promise<AttendanceSession[]> {
    return guard('session registry', async () => {
      const query = filter.status ? { status: filter.status } : {};
      const docs = await SessionModel.find(query).sort({ sessionId: 1 }).lean();
      return docs.map(toSession);
    });
  }

  create(input: CreateSessionInput): Promise<AttendanceSession> {
    return guard('session registry', async () => {
      const counter = await CounterModel.findOneAndUpdate(
        { _id: SESSION_COUNTER_ID },
        { $inc: { seq: 1 } },
        { upsert: true, new: true }
      ).lean();
      if (!counter) {
        throw new InfrastructureError('session registry', 'Could not allocate a session id');
      }

      const doc = await SessionModel.create({
        sessionId: counter.seq,
        classroomSegment: input.classroomSegment,
        label: input.label,
        status: 'OPEN',
        startsAt: input.startsAt,
        endsAt: input.endsAt,
        closedAt: null,
        createdAt: new Date(),
      });
      return toSession(doc.toObject());
    });
  }

  close(sessionId: number, closedAt: Date): Promise<AttendanceSession | null> {
    return guard('session registry', async () => {
      const closed = await SessionModel.findOneAndUpdate(
        { sessionId, status: 'OPEN' },
        { $set: { status: 'CLOSED', closedAt } },
        { new: true }
      ).lean();
      if (closed) {
        return toSession(closed);
      }
      // Either absent or already closed
      const existing = await SessionModel.findOne({ sessionId }).lean();
      return existing ? toSession(existing) : null;
    });
  }
}

export class MongoAttachmentStore implements AttachmentStore {
  findByDevice(deviceIdentifier: string): Promise<DeviceAttachment | null> {
    return guard('network attachment table', async () => {
      const doc = await DeviceAttachmentModel.findOne({ deviceIdentifier }).lean();
      return doc ? toAttachment(doc) : null;
    });
  }

  upsertMany(attachments: DeviceAttachment[]): Promise<number> {
    return guard('network attachment table', async () => {
      if (attachments.length === 0) {
        return 0;
      }
      await DeviceAttachmentModel.bulkWrite(
        attachments.map((attachment) => ({
          updateOne: {
            filter: { deviceIdentifier: attachment.deviceIdentifier },
            update: {
              $set: { networkAddress: attachment.networkAddress, observedAt: attachment.observedAt },
            },
            upsert: true,
          },
        }))
      );
      return attachments.length;
    });
  }

  remove(deviceIdentifier: string): Promise<boolean> {
    return guard('network attachment table', async () => {
      const result = await DeviceAttachmentModel.deleteOne({ deviceIdentifier });
      return result.deletedCount > 0;
    });
  }
}

export class MongoDeviceRegistryStore implements DeviceRegistryStore {
  findByDevice(deviceIdentifier: string): Promise<DeviceRegistration | null> {
    return guard('device registry', async () => {
      const doc = await DeviceRegistrationModel.findOne({ deviceIdentifier }).lean();
      return doc ? toRegistration(doc) : null;
    });
  }

  list(filter: { studentId?: string }): Promise<DeviceRegistration[]> {
    return guard('device registry', async () => {
      const query = filter.studentId ? { studentId: filter.studentId } : {};
      const docs = await DeviceRegistrationModel.find(query).sort({ deviceIdentifier: 1 }).lean();
      return docs.map(toRegistration);
    });
  }

  register(registration: DeviceRegistration): Promise<DeviceRegistration> {
    return guard('device registry', async () => {
      const doc = await DeviceRegistrationModel.findOneAndUpdate(
        { deviceIdentifier: registration.deviceIdentifier },
        { $set: { studentId: registration.studentId, registeredAt: registration.registeredAt } },
        { upsert: true, new: true }
      ).lean();
      if (!doc) {
        throw new InfrastructureError('device registry', 'Device registration was not stored');
      }
      return toRegistration(doc);
    });
  }

  remove(deviceIdentifier: string): Promise<boolean> {
    return guard('device registry', async () => {
      const result = await DeviceRegistrationModel.deleteOne({ deviceIdentifier });
      return result.deletedCount > 0;
    });
  }
}

export class MongoAttendanceStore implements AttendanceStore {
  insertIfAbsent(input: NewAttendanceRecord): Promise<InsertResult> {
    return guard('attendance store', async () => {
      try {
        const doc = await AttendanceRecordModel.create(input);
        return { created: true, record: toRecord(doc.toObject()) };
      } catch (error) {
        if (!isDuplicateKeyError(error)) {
          throw error;
        }
      }

      // Lost the race (or a repeat check-in): the unique index kept the first record.
      const existing = await AttendanceRecordModel.findOne({
        studentId: input.studentId,
        sessionId: input.sessionId,
      }).lean();
      if (!existing) {
        throw new InfrastructureError('attendance store', 'Write conflict on attendance record could not be resolved');
      }
      return { created: false, record: toRecord(existing) };
    });
  }

  listBySession(sessionId: number): Promise<AttendanceRecord[]> {
    return guard('attendance store', async () => {
      const docs = await AttendanceRecordModel.find({ sessionId }).sort({ checkedInAt: 1 }).lean();
      return docs.map(toRecord);
    });
  }

  listByStudent(studentId: string): Promise<AttendanceRecord[]> {
    return guard('attendance store', async () => {
      const docs = await AttendanceRecordModel.find({ studentId }).sort({ checkedInAt: -1 }).lean();
      return docs.map(toRecord);
    });
  }
}

export const createMongoStores = (): Stores => ({
  sessions: new MongoSessionStore(),
  attachments: new MongoAttachmentStore(),
  devices: new MongoDeviceRegistryStore(),
  attendance: new MongoAttendanceStore(),
});
