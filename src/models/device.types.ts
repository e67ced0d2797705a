// src/models/device.types.ts
import { z } from 'zod';

/**
 * Binds a hardware address to the one student who owns it. A student may own several devices.
 */
export interface DeviceRegistration {
  deviceIdentifier: string;
  studentId: string;
  registeredAt: Date;
}

export const registerDeviceSchema = z.object({
  studentId: z.string().trim().min(1, 'studentId is required'),
});

export const listDevicesQuerySchema = z.object({
  studentId: z.string().trim().min(1).optional(),
});
