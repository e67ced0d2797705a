// src/lib/time.utils.ts
import { InfrastructureError } from '@/lib/errors';

/**
 * Checks whether `now` falls inside a validity window. Missing bounds are open-ended.
 * The window includes its start and excludes its end.
 */
export const isWithinWindow = (now: Date, startsAt: Date | null, endsAt: Date | null): boolean => {
  const time = now.getTime();
  if (startsAt && time < startsAt.getTime()) {
    return false;
  }
  if (endsAt && time >= endsAt.getTime()) {
    return false;
  }
  return true;
};

/**
 * Races `work` against a timer. If the timer wins, rejects with an InfrastructureError naming
 * `dependency`. The timer is always cleared, whichever side settles first.
 */
export const withDeadline = async <T>(work: Promise<T>, timeoutMs: number, dependency: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new InfrastructureError(dependency, `${dependency} did not respond within ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
};
