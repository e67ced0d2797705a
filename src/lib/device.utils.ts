// src/lib/device.utils.ts
import { InvalidArgumentError, InvalidIdentifierError } from '@/lib/errors';

// Six hex octets with one consistent separator, e.g. AA:BB:CC:DD:EE:FF or aa-bb-cc-dd-ee-ff
const DEVICE_IDENTIFIER_PATTERN = /^[0-9a-f]{2}([:-])(?:[0-9a-f]{2}\1){4}[0-9a-f]{2}$/i;

export const isValidDeviceIdentifier = (value: unknown): value is string =>
  typeof value === 'string' && DEVICE_IDENTIFIER_PATTERN.test(value.trim());

/**
 * Canonical form of a hardware address: upper case, colon separated.
 * Throws InvalidIdentifierError when the value does not match the address pattern.
 */
export const normalizeDeviceIdentifier = (value: unknown): string => {
  if (!isValidDeviceIdentifier(value)) {
    throw new InvalidIdentifierError(
      'deviceIdentifier must be a hardware address of six hex octets, e.g. AA:BB:CC:DD:EE:FF'
    );
  }
  return value.trim().toUpperCase().replace(/-/g, ':');
};

/**
 * Prefix match of a device's current network address against a classroom segment.
 */
export const matchesSegment = (networkAddress: string, classroomSegment: string): boolean => {
  const segment = classroomSegment.trim().toLowerCase();
  if (segment.length === 0) {
    return false;
  }
  return networkAddress.trim().toLowerCase().startsWith(segment);
};

export const assertValidSessionId = (sessionId: unknown): number => {
  if (typeof sessionId !== 'number' || !Number.isInteger(sessionId) || sessionId <= 0) {
    throw new InvalidArgumentError('sessionId must be a positive integer');
  }
  return sessionId;
};
