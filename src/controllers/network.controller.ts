// src/controllers/network.controller.ts
// Classroom routers push their association tables here; the presence resolver reads them back.
import { Request, Response, NextFunction } from 'express';
import { isValidDeviceIdentifier, normalizeDeviceIdentifier } from '@/lib/device.utils';
import { logger } from '@/lib/logger';
import { stores } from '@/lib/stores';
import { parseInput } from '@/lib/validation';
import { DeviceAttachment, attachmentPushSchema } from '@/models/network.types';

// POST /network/attachments
export const pushAttachments = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { attachments } = parseInput(attachmentPushSchema, req.body);
    const observedAt = new Date();

    const accepted: DeviceAttachment[] = [];
    let skipped = 0;
    for (const entry of attachments) {
      const { deviceIdentifier, networkAddress } = entry;
      if (!isValidDeviceIdentifier(deviceIdentifier) || typeof networkAddress !== 'string' || !networkAddress.trim()) {
        skipped += 1;
        continue;
      }
      accepted.push({
        deviceIdentifier: normalizeDeviceIdentifier(deviceIdentifier),
        networkAddress: networkAddress.trim(),
        observedAt,
      });
    }

    const saved = await stores.attachments.upsertMany(accepted);
    if (skipped > 0) {
      logger.warn('Network', `Router push skipped ${skipped} malformed entries`);
    }

    return res.status(200).json({ message: 'Attachments recorded', saved, skipped });
  } catch (error) {
    return next(error);
  }
};

// DELETE /network/attachments/:deviceIdentifier
export const removeAttachment = async (req: Request, res: Response, next: NextFunction) => {
  try {
    const deviceIdentifier = normalizeDeviceIdentifier(req.params.deviceIdentifier);
    const removed = await stores.attachments.remove(deviceIdentifier);
    if (!removed) {
      return res.status(404).json({ message: `No attachment known for device ${deviceIdentifier}.` });
    }
    return res.status(204).send();
  } catch (error) {
    return next(error);
  }
};
