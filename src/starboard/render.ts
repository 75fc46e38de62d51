import { type APIEmbed, EmbedBuilder, formatEmoji } from 'discord.js';
import type { LiveMessage } from '../types/starboard.js';

const MAX_DESCRIPTION = 2048;
const ZERO_WIDTH_SPACE = '\u200B';
const IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'gifv', 'svg', 'webp'];

/** Custom emojis are stored by id; unicode emojis are stored as-is. */
export function displayEmoji(token: string): string {
  return /^\d+$/.test(token) ? formatEmoji(token) : token;
}

export function buildPlainText(opts: {
  emoji: string;
  points: number;
  channelId: string;
  forced: boolean;
  frozen: boolean;
}): string {
  return (
    `**${displayEmoji(opts.emoji)} ${opts.points} | <#${opts.channelId}>**` +
    `${opts.forced ? ' 🔒' : ''}${opts.frozen ? ' ❄️' : ''}`
  );
}

function isImage(url: string): boolean {
  const path = url.split('?')[0].toLowerCase();
  return IMAGE_EXTENSIONS.some(ext => path.endsWith(`.${ext}`));
}

export function renderMirror(message: LiveMessage, color: number): APIEmbed {
  let description = message.content;
  if (description.length > MAX_DESCRIPTION) {
    description = `${description.slice(0, MAX_DESCRIPTION - 4)} ...`;
  }

  const embed = new EmbedBuilder()
    .setColor(color)
    .setAuthor({ name: message.authorName, iconURL: message.authorAvatarUrl ?? undefined })
    .setTimestamp(message.createdAt)
    .addFields({ name: ZERO_WIDTH_SPACE, value: `**[Jump to Message](${message.url})**` });

  if (description.length > 0) embed.setDescription(description);

  const image = message.nsfw
    ? undefined
    : message.attachments.find(a => !a.spoiler && isImage(a.url));
  if (image) embed.setImage(image.url);

  const links = message.attachments
    .filter(a => a !== image)
    .map(a => `**[${a.name}](${a.url})**`);
  if (links.length > 0) {
    embed.addFields({ name: ZERO_WIDTH_SPACE, value: links.join('\n') });
  }

  return embed.toJSON();
}
