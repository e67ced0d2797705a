import { Schema, model } from 'mongoose';

export interface IAttendanceRecord {
  studentId: string;
  sessionId: number;
  deviceIdentifier: string;
  networkAddress: string;
  checkedInAt: Date;
}

const AttendanceRecordSchema = new Schema<IAttendanceRecord>({
  studentId: { type: String, required: true },
  sessionId: { type: Number, required: true },
  deviceIdentifier: { type: String, required: true },
  networkAddress: { type: String, required: true },
  checkedInAt: { type: Date, required: true },
});

// One record per student per session; concurrent inserts for the same pair lose with E11000.
AttendanceRecordSchema.index({ studentId: 1, sessionId: 1 }, { unique: true });
AttendanceRecordSchema.index({ sessionId: 1, checkedInAt: 1 });

export const AttendanceRecordModel = model<IAttendanceRecord>(
  'AttendanceRecord',
  AttendanceRecordSchema,
  'attendance_records'
);
