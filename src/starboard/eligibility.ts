import type { DbMessage, DbStarboard } from '../types/database.js';
import type { Decision } from '../types/starboard.js';
import type { PatternOutcome } from '../utils/regexGuard.js';

export interface EligibilityInput {
  message: Pick<DbMessage, 'is_nsfw' | 'frozen' | 'forced'>;
  authorIsBot: boolean;
  starboard: DbStarboard;
  points: number;
  livePresent: boolean;
  /** `null` when the pattern is disabled or the live message could not be resolved. */
  regex: PatternOutcome | null;
  excludeRegex: PatternOutcome | null;
}

/**
 * Decides whether a message belongs on a starboard. Rules are applied in order and
 * each later rule overrides the earlier ones; a forced message always ends up added.
 */
export function evaluate(input: EligibilityInput): Decision {
  const { message, starboard, points } = input;

  // A score that satisfies both thresholds is removed.
  let remove = points <= starboard.required_remove;
  let add = !remove && points >= starboard.required;
  let frozen = false;
  let forced = false;

  if (!starboard.allow_bots && input.authorIsBot) {
    remove = true;
    add = false;
  }

  if (starboard.link_deletes && !input.livePresent) {
    remove = true;
    add = false;
  }

  if (message.is_nsfw && !starboard.allow_nsfw) {
    remove = true;
    add = false;
  }

  // Timeouts and broken patterns reject the message.
  if (input.regex !== null && input.regex !== 'match') {
    remove = true;
    add = false;
  }

  if (input.excludeRegex !== null && input.excludeRegex !== 'no-match') {
    remove = true;
    add = false;
  }

  if (message.frozen) {
    remove = false;
    add = false;
    frozen = true;
  }

  if (message.forced.includes(starboard.id)) {
    remove = false;
    add = true;
    forced = true;
  }

  return { add, delete: remove, forced, frozen };
}
