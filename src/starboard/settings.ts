import { z } from 'zod';
import { isRegexPatternSafe } from '../utils/regexGuard.js';

const patternSchema = z
  .string()
  .refine(isRegexPatternSafe, { message: 'Pattern is invalid or could cause catastrophic backtracking' });

export const starboardSettingsSchema = z.object({
  required: z.number().int().min(-1000).max(1000).default(3),
  required_remove: z.number().int().min(-1000).max(1000).default(0),
  self_star: z.boolean().default(false),
  allow_bots: z.boolean().default(true),
  allow_nsfw: z.boolean().default(false),
  link_edits: z.boolean().default(true),
  link_deletes: z.boolean().default(false),
  star_emojis: z.array(z.string().min(1)).min(1).default(['⭐']),
  display_emoji: z.string().min(1).default('⭐'),
  color: z.number().int().min(0).max(0xffffff).nullable().default(null),
  regex: patternSchema.default(''),
  exclude_regex: patternSchema.default(''),
  autoreact: z.boolean().default(true),
});

export type StarboardSettings = z.infer<typeof starboardSettingsSchema>;
export type StarboardSettingsInput = z.input<typeof starboardSettingsSchema>;

// Optional wraps each default, so omitted keys stay omitted.
export const starboardSettingsPatchSchema = starboardSettingsSchema.partial();

export type StarboardSettingsPatch = z.infer<typeof starboardSettingsPatchSchema>;

export const stringListSchema = z.array(z.string());
