import { Schema, model } from 'mongoose';
import { SessionStatus } from '@/models/session.types';

export interface ISession {
  sessionId: number;
  classroomSegment: string;
  label: string | null;
  status: SessionStatus;
  startsAt: Date | null;
  endsAt: Date | null;
  closedAt: Date | null;
  createdAt: Date;
}

const SessionSchema = new Schema<ISession>({
  sessionId: { type: Number, required: true, unique: true },
  classroomSegment: { type: String, required: true, trim: true },
  label: { type: String, default: null },
  status: { type: String, enum: ['OPEN', 'CLOSED'], required: true, default: 'OPEN' },
  startsAt: { type: Date, default: null },
  endsAt: { type: Date, default: null },
  closedAt: { type: Date, default: null },
  createdAt: { type: Date, default: Date.now },
});

export const SessionModel = model<ISession>('AttendanceSession', SessionSchema, 'attendance_sessions');

// Sequential positive ids for sessions, handed out by an atomic $inc.
interface ICounter {
  _id: string;
  seq: number;
}

const CounterSchema = new Schema<ICounter>({
  _id: { type: String, required: true },
  seq: { type: Number, required: true, default: 0 },
});

export const CounterModel = model<ICounter>('Counter', CounterSchema, 'counters');
