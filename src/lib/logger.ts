import { config } from '@/config/env';

type LogMeta = Record<string, unknown>;

// Test runs stay quiet; everything else goes to the console with a component prefix.
const isEnabled = (): boolean => config.nodeEnv !== 'test';

const format = (scope: string, message: string): string => `[${scope}] ${message}`;

export const logger = {
  info(scope: string, message: string, meta?: LogMeta): void {
    if (!isEnabled()) return;
    if (meta) console.log(format(scope, message), meta);
    else console.log(format(scope, message));
  },

  warn(scope: string, message: string, meta?: LogMeta): void {
    if (!isEnabled()) return;
    if (meta) console.warn(format(scope, message), meta);
    else console.warn(format(scope, message));
  },

  error(scope: string, message: string, error?: unknown): void {
    if (!isEnabled()) return;
    console.error(format(scope, message), error instanceof Error ? error.stack || error.message : error);
  },
};
