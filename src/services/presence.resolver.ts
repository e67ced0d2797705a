// src/services/presence.resolver.ts
import { normalizeDeviceIdentifier } from '@/lib/device.utils';
import { withDeadline } from '@/lib/time.utils';
import { PresenceResult } from '@/models/network.types';
import { AttachmentStore } from '@/repositories/types';

export interface PresenceResolverOptions {
  lookupTimeoutMs: number;
  /** Attachments last observed longer ago than this count as detached. 0 disables the check. */
  maxAttachmentAgeMs: number;
  now?: () => Date;
}

/**
 * Answers "where is this device on the network right now?" from the attachment table the
 * classroom routers keep up to date. Read-only.
 */
export class NetworkPresenceResolver {
  private readonly now: () => Date;

  constructor(
    private readonly attachments: AttachmentStore,
    private readonly options: PresenceResolverOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws InvalidIdentifierError when the identifier is malformed
   * @throws InfrastructureError when the attachment table cannot be read in time
   */
  async resolve(deviceIdentifier: string): Promise<PresenceResult> {
    const device = normalizeDeviceIdentifier(deviceIdentifier);
    const attachment = await withDeadline(
      this.attachments.findByDevice(device),
      this.options.lookupTimeoutMs,
      'network attachment table'
    );

    if (!attachment) {
      return { attached: false };
    }

    const { maxAttachmentAgeMs } = this.options;
    if (maxAttachmentAgeMs > 0 && this.now().getTime() - attachment.observedAt.getTime() > maxAttachmentAgeMs) {
      return { attached: false };
    }

    return {
      attached: true,
      networkAddress: attachment.networkAddress,
      observedAt: attachment.observedAt,
    };
  }
}
