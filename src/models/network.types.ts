// src/models/network.types.ts
import { z } from 'zod';

/**
 * Latest known attachment of a device to the network, as reported by the classroom router.
 */
export interface DeviceAttachment {
  deviceIdentifier: string;
  networkAddress: string;
  observedAt: Date;
}

export type PresenceResult =
  | { attached: true; networkAddress: string; observedAt: Date }
  | { attached: false };

// Entries are validated one by one so a router push with a few bad rows still lands the rest.
export const attachmentPushSchema = z.object({
  attachments: z
    .array(
      z.object({
        deviceIdentifier: z.unknown(),
        networkAddress: z.unknown(),
      })
    )
    .max(2000),
});
