import pLimit, { type LimitFunction } from 'p-limit';

interface KeyedLimiter {
  limit: LimitFunction;
  users: number;
}

const limiters = new Map<string, KeyedLimiter>();

/**
 * Runs `fn` exclusively for `key`: calls sharing a key are queued and executed one
 * at a time, calls with different keys run independently.
 */
export async function withKeyedLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  let entry = limiters.get(key);
  if (!entry) {
    entry = { limit: pLimit(1), users: 0 };
    limiters.set(key, entry);
  }

  entry.users++;
  try {
    return await entry.limit(fn);
  } finally {
    entry.users--;
    if (entry.users === 0) limiters.delete(key);
  }
}

export function activeLockCount(): number {
  return limiters.size;
}
