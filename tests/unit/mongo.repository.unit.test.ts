import mongoose, { Types, mongo } from 'mongoose';
import { InfrastructureError } from '@/lib/errors';
import { AttendanceRecordModel } from '@/models/attendance.model';
import { MongoAttendanceStore, isDuplicateKeyError } from '@/repositories/mongo.repository';

describe('isDuplicateKeyError', () => {
  it('recognises E11000 server errors only', () => {
    expect(isDuplicateKeyError(new mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 }))).toBe(true);
    expect(isDuplicateKeyError(new mongo.MongoServerError({ message: 'not primary', code: 10107 }))).toBe(false);
    expect(isDuplicateKeyError(new Error('E11000 duplicate key error'))).toBe(false);
  });
});

describe('MongoAttendanceStore', () => {
  const entry = {
    studentId: 'alice',
    sessionId: 1,
    deviceIdentifier: 'AA:BB:CC:DD:EE:FF',
    networkAddress: '10.0.5.23',
    checkedInAt: new Date('2026-03-02T09:05:00.000Z'),
  };
  const duplicateKey = () =>
    new mongo.MongoServerError({ message: 'E11000 duplicate key error collection: attendance_records', code: 11000 });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns the stored record when the unique index rejects a second insert', async () => {
    const storedId = new Types.ObjectId('65f1c0ffee0000000000abcd');
    jest.spyOn(AttendanceRecordModel, 'create').mockRejectedValue(duplicateKey());
    const findOne = jest.spyOn(AttendanceRecordModel, 'findOne');
    jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue({
      _id: storedId,
      studentId: 'alice',
      sessionId: 1,
      deviceIdentifier: 'AA:BB:CC:DD:EE:FF',
      networkAddress: '10.0.5.23',
      checkedInAt: new Date('2026-03-02T09:00:00.000Z'),
    });

    const result = await new MongoAttendanceStore().insertIfAbsent(entry);

    expect(findOne).toHaveBeenCalledWith({ studentId: 'alice', sessionId: 1 });
    expect(result).toEqual({
      created: false,
      record: {
        id: '65f1c0ffee0000000000abcd',
        studentId: 'alice',
        sessionId: 1,
        deviceIdentifier: 'AA:BB:CC:DD:EE:FF',
        networkAddress: '10.0.5.23',
        checkedInAt: new Date('2026-03-02T09:00:00.000Z'),
      },
    });
  });

  it('raises an InfrastructureError when the conflicting record cannot be read back', async () => {
    jest.spyOn(AttendanceRecordModel, 'create').mockRejectedValue(duplicateKey());
    jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue(null);

    const attempt = new MongoAttendanceStore().insertIfAbsent(entry);

    await expect(attempt).rejects.toBeInstanceOf(InfrastructureError);
    await expect(attempt).rejects.toMatchObject({
      dependency: 'attendance store',
      message: 'Write conflict on attendance record could not be resolved',
    });
  });

  it('wraps driver failures in an InfrastructureError naming the attendance store', async () => {
    jest.spyOn(AttendanceRecordModel, 'create').mockRejectedValue(new Error('connection refused'));
    const store = new MongoAttendanceStore();

    const attempt = store.insertIfAbsent({
      studentId: 'alice',
      sessionId: 1,
      deviceIdentifier: 'AA:BB:CC:DD:EE:FF',
      networkAddress: '10.0.5.23',
      checkedInAt: new Date('2026-03-02T09:00:00.000Z'),
    });

    await expect(attempt).rejects.toBeInstanceOf(InfrastructureError);
    await expect(attempt).rejects.toMatchObject({
      dependency: 'attendance store',
      message: 'attendance store is unavailable',
    });
  });
});
