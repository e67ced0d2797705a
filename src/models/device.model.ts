import { Schema, model } from 'mongoose';

export interface IDeviceRegistration {
  deviceIdentifier: string; // canonical upper-case hardware address
  studentId: string;
  registeredAt: Date;
}

const DeviceRegistrationSchema = new Schema<IDeviceRegistration>({
  deviceIdentifier: { type: String, required: true, unique: true },
  studentId: { type: String, required: true, index: true },
  registeredAt: { type: Date, required: true },
});

export const DeviceRegistrationModel = model<IDeviceRegistration>(
  'DeviceRegistration',
  DeviceRegistrationSchema,
  'device_registrations'
);
