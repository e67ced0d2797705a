import mongoose from 'mongoose';
import { InfrastructureError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { AttendanceRecordModel } from '@/models/attendance.model';
import { DeviceAttachmentModel } from '@/models/attachment.model';
import { DeviceRegistrationModel } from '@/models/device.model';
import { CounterModel, SessionModel } from '@/models/session.model';

// Queries against a disconnected client fail immediately instead of queueing.
mongoose.set('bufferCommands', false);

/**
 * Connects and builds every model's indexes before resolving. The unique (studentId, sessionId)
 * index must exist before the first check-in, so a failed build fails startup.
 */
export const connectDatabase = async (uri: string): Promise<void> => {
  await mongoose.connect(uri, {
    serverSelectionTimeoutMS: 5000,
  });

  try {
    await Promise.all([
      SessionModel.createIndexes(),
      CounterModel.createIndexes(),
      DeviceAttachmentModel.createIndexes(),
      DeviceRegistrationModel.createIndexes(),
      AttendanceRecordModel.createIndexes(),
    ]);
  } catch (error) {
    await mongoose.disconnect();
    throw new InfrastructureError('database', 'MongoDB indexes could not be built', error);
  }
  logger.info('Database', 'MongoDB connected, indexes ready.');
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.disconnect();
  logger.info('Database', 'MongoDB disconnected.');
};
