import { runInNewContext } from 'node:vm';
import safeRegex from 'safe-regex2';

export type PatternOutcome = 'match' | 'no-match' | 'timeout' | 'invalid';

const MAX_PATTERN_LENGTH = 1024;

/**
 * Validates a user supplied pattern before it is saved on a starboard.
 * Empty patterns mean "disabled" and are always accepted.
 */
export function isRegexPatternSafe(pattern: string): boolean {
  const p = pattern.trim();
  if (p.length === 0) return true;
  if (p.length > MAX_PATTERN_LENGTH) return false;
  if (!safeRegex(p)) return false;

  try {
    new RegExp(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Tests `text` against `pattern` inside a throwaway VM context so the match can be
 * interrupted after `timeoutMs` of wall-clock time.
 *
 * Patterns stored before validation existed may still backtrack badly, so the
 * bound applies to every match, not just unvalidated ones.
 */
export function matchPattern(text: string, pattern: string, timeoutMs: number): PatternOutcome {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch {
    return 'invalid';
  }

  try {
    const matched: unknown = runInNewContext('regex.test(text)', { regex, text }, { timeout: timeoutMs });
    return matched === true ? 'match' : 'no-match';
  } catch (err) {
    if (isTimeout(err)) return 'timeout';
    throw err;
  }
}

function isTimeout(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT'
  );
}
