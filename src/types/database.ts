export interface DbGuild {
  id: string;
  log_channel_id: string | null;
  created_at: string;
}

export interface DbUser {
  id: string;
  is_bot: boolean;
  created_at: string;
}

export interface DbMember {
  user_id: string;
  guild_id: string;
  stars_given: number;
  stars_received: number;
  xp: number;
  level: number;
}

export interface DbStarboard {
  id: string;
  guild_id: string;
  required: number;
  required_remove: number;
  self_star: boolean;
  allow_bots: boolean;
  allow_nsfw: boolean;
  link_edits: boolean;
  link_deletes: boolean;
  star_emojis: string[];
  display_emoji: string;
  color: number | null;
  regex: string;
  exclude_regex: string;
  autoreact: boolean;
}

export interface DbMessage {
  id: string;
  guild_id: string;
  channel_id: string;
  author_id: string | null;
  is_nsfw: boolean;
  forced: string[];
  trashed: boolean;
  frozen: boolean;
}

export interface DbStarboardMessage {
  id: string;
  orig_id: string;
  starboard_id: string;
  points: number | null;
}

/** A reaction on a source message together with everyone who reacted with it. */
export interface DbReactionVotes {
  emoji: string;
  user_ids: string[];
}

export interface RandomStarredFilters {
  starboardId?: string;
  minPoints?: number;
  authorId?: string;
  channelId?: string;
}
