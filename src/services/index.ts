import { config } from '@/config/env';
import { stores } from '@/lib/stores';
import { CheckInValidator } from '@/services/checkin.validator';
import { NetworkPresenceResolver } from '@/services/presence.resolver';
import { SessionRegistry } from '@/services/session.registry';

export const sessionRegistry = new SessionRegistry(stores.sessions, config.lookupTimeoutMs);

export const presenceResolver = new NetworkPresenceResolver(stores.attachments, {
  lookupTimeoutMs: config.lookupTimeoutMs,
  maxAttachmentAgeMs: config.attachmentMaxAgeMs,
});

export const checkInValidator = new CheckInValidator({
  registry: sessionRegistry,
  resolver: presenceResolver,
  devices: stores.devices,
  attendance: stores.attendance,
  lookupTimeoutMs: config.lookupTimeoutMs,
  writeTimeoutMs: config.lookupTimeoutMs,
});
