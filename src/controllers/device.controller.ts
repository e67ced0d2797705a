// src/controllers/device.controller.ts
// Administrators bind hardware addresses to students. A check-in only counts from the caller's own device.
import { Request, Response, NextFunction } from 'express';
import { normalizeDeviceIdentifier } from '@/lib/device.utils';
import { logger } from '@/lib/logger';
import { stores } from '@/lib/stores';
import { parseInput } from '@/lib/validation';
import { DeviceRegistration, listDevicesQuerySchema, registerDeviceSchema } from '@/models/device.types';

const serializeRegistration = (registration: DeviceRegistration) => ({
  deviceIdentifier: registration.deviceIdentifier,
  studentId: registration.studentId,
  registeredAt: registration.registeredAt.toISOString(),
});

// PUT /devices/:deviceIdentifier
export const registerDevice = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const deviceIdentifier = normalizeDeviceIdentifier(req.params.deviceIdentifier);
    const { studentId } = parseInput(registerDeviceSchema, req.body);

    const previous = await stores.devices.findByDevice(deviceIdentifier);
    const registration = await stores.devices.register({ deviceIdentifier, studentId, registeredAt: new Date() });

    if (previous && previous.studentId !== studentId) {
      logger.warn('Devices', `Device ${deviceIdentifier} moved from ${previous.studentId} to ${studentId}`);
    } else {
      logger.info('Devices', `Device ${deviceIdentifier} registered to ${studentId}`);
    }
    return res.status(200).json(serializeRegistration(registration));
  } catch (error) {
    return next(error);
  }
};

// GET /devices?studentId=
export const listDevices = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { studentId } = parseInput(listDevicesQuerySchema, req.query);
    const registrations = await stores.devices.list({ studentId });
    return res.status(200).json(registrations.map(serializeRegistration));
  } catch (error) {
    return next(error);
  }
};

// DELETE /devices/:deviceIdentifier
export const unregisterDevice = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const deviceIdentifier = normalizeDeviceIdentifier(req.params.deviceIdentifier);
    const removed = await stores.devices.remove(deviceIdentifier);
    if (!removed) {
      return res.status(404).json({ message: `Device ${deviceIdentifier} is not registered.` });
    }
    return res.status(204).send();
  } catch (error) {
    return next(error);
  }
};
