import { Schema, model } from 'mongoose';

export interface IDeviceAttachment {
  deviceIdentifier: string; // canonical upper-case hardware address
  networkAddress: string;
  observedAt: Date;
}

const DeviceAttachmentSchema = new Schema<IDeviceAttachment>({
  deviceIdentifier: { type: String, required: true, unique: true },
  networkAddress: { type: String, required: true },
  observedAt: { type: Date, required: true },
});

export const DeviceAttachmentModel = model<IDeviceAttachment>(
  'DeviceAttachment',
  DeviceAttachmentSchema,
  'device_attachments'
);
