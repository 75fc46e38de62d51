import { calculatePoints } from './points.js';
import { evaluate } from './eligibility.js';
import { buildPlainText, renderMirror } from './render.js';
import type { DbMessage, DbStarboard, DbStarboardMessage } from '../types/database.js';
import type {
  LiveMessage,
  MessageCache,
  MirrorChannelGateway,
  MirrorPayload,
  MirrorTarget,
  Notifier,
  StarboardStore,
} from '../types/starboard.js';
import { PermissionDeniedError, RemoteNotFoundError } from '../utils/errors.js';
import { withKeyedLock } from '../utils/keyedLock.js';
import { logger } from '../utils/logger.js';
import { matchPattern, type PatternOutcome } from '../utils/regexGuard.js';

export type ReconcileOutcome = 'created' | 'updated' | 'deleted' | 'unchanged' | 'denied';

export interface ReconcilerDeps {
  store: StarboardStore;
  cache: MessageCache;
  channels: MirrorChannelGateway;
  notify: Notifier;
  regexTimeoutMs: number;
  themeColor: number;
}

export interface Reconciler {
  reconcile(message: DbMessage, starboard: DbStarboard): Promise<ReconcileOutcome>;
}

export function createReconciler(deps: ReconcilerDeps): Reconciler {
  const { store, cache, channels, notify } = deps;

  function checkPattern(guildId: string, live: LiveMessage, pattern: string): PatternOutcome | null {
    if (pattern === '') return null;

    const outcome = matchPattern(live.content, pattern, deps.regexTimeoutMs);
    if (outcome === 'timeout') {
      notify(
        guildId,
        `I tried to match \`${pattern}\` to [a message](${live.url}), but it took too long. ` +
          'Try improving the efficiency of your regex.',
        'error',
      );
    } else if (outcome === 'invalid') {
      notify(guildId, `\`${pattern}\` is not a valid regular expression, so [a message](${live.url}) was rejected.`, 'error');
    }
    return outcome;
  }

  async function removeMirror(target: MirrorTarget, link: DbStarboardMessage): Promise<ReconcileOutcome> {
    store.deleteStarboardMessage(link.id);
    try {
      await channels.delete(target, link.id);
    } catch (err) {
      if (err instanceof RemoteNotFoundError) {
        logger.debug('Starboard message was already gone', { mirrorId: link.id });
        return 'deleted';
      }
      if (err instanceof PermissionDeniedError) {
        store.createStarboardMessage(link.id, link.orig_id, link.starboard_id);
        if (link.points !== null) store.setPoints(link.id, link.points);
        notify(
          target.guildId,
          `I tried to remove a message from <#${target.channelId}>, but I'm missing the ` +
            `\`${err.permission}\` permission there. Please make sure I have the \`Manage Messages\` permission.`,
          'error',
        );
        return 'denied';
      }
      throw err;
    }
    return 'deleted';
  }

  async function editMirror(target: MirrorTarget, mirrorId: string, payload: MirrorPayload): Promise<ReconcileOutcome> {
    try {
      await channels.edit(target, mirrorId, payload);
    } catch (err) {
      // The stale link is dropped on the next pass when the mirror cannot be resolved.
      if (err instanceof RemoteNotFoundError) return 'unchanged';
      if (err instanceof PermissionDeniedError) {
        notify(
          target.guildId,
          `I tried to update a message in <#${target.channelId}>, but I'm missing the \`${err.permission}\` permission there.`,
          'error',
        );
        return 'denied';
      }
      throw err;
    }
    return 'updated';
  }

  async function autoreact(target: MirrorTarget, mirrorId: string, emojis: string[]): Promise<void> {
    for (const emoji of emojis) {
      try {
        await channels.react(target, mirrorId, emoji);
      } catch (err) {
        if (err instanceof PermissionDeniedError) {
          notify(
            target.guildId,
            `I tried to autoreact to a message on <#${target.channelId}>, but I'm missing the proper permissions. ` +
              'If you don\'t want me to autoreact to messages, turn the autoreact setting off for this starboard.',
            'error',
          );
        } else if (err instanceof RemoteNotFoundError) {
          logger.warn('Autoreact target vanished', { mirrorId, emoji });
          return;
        } else {
          throw err;
        }
      }
    }
  }

  async function createMirror(
    target: MirrorTarget,
    message: DbMessage,
    starboard: DbStarboard,
    payload: MirrorPayload,
    points: number,
  ): Promise<ReconcileOutcome> {
    let mirrorId: string;
    try {
      mirrorId = await channels.send(target, payload);
    } catch (err) {
      if (err instanceof PermissionDeniedError) {
        notify(
          target.guildId,
          `I tried to send a starboard message to <#${target.channelId}>, but I'm missing the proper permissions. ` +
            'Please make sure I have the `Send Messages` permission.',
          'error',
        );
        return 'denied';
      }
      throw err;
    }

    store.createStarboardMessage(mirrorId, message.id, starboard.id);
    store.setPoints(mirrorId, points);
    logger.info(`Message ${message.id} added to starboard ${starboard.id}`, { mirrorId, points });

    if (starboard.autoreact) {
      await autoreact(target, mirrorId, starboard.star_emojis);
    }
    return 'created';
  }

  async function sync(message: DbMessage, starboard: DbStarboard): Promise<ReconcileOutcome> {
    const guildId = message.guild_id;
    const target: MirrorTarget = { guildId, channelId: starboard.id };

    let link = store.getStarboardMessage(message.id, starboard.id);
    if (link && !(await cache.fetchMessage(guildId, starboard.id, link.id))) {
      logger.info('Starboard message is missing, dropping its link', { mirrorId: link.id, starboardId: starboard.id });
      store.deleteStarboardMessage(link.id);
      link = undefined;
    }

    const points =
      message.frozen && link && link.points !== null
        ? link.points
        : calculatePoints(store.getReactions(message.id), message.author_id, starboard);

    // Stored before any transition so a restored link keeps the current score.
    if (link) {
      store.setPoints(link.id, points);
      link = { ...link, points };
    }

    if (message.trashed) {
      return link ? removeMirror(target, link) : 'unchanged';
    }

    const live = await cache.fetchMessage(guildId, message.channel_id, message.id);

    const author = message.author_id ? store.getUser(message.author_id) : undefined;
    const decision = evaluate({
      message,
      authorIsBot: author?.is_bot ?? false,
      starboard,
      points,
      livePresent: live !== null,
      regex: live ? checkPattern(guildId, live, starboard.regex) : null,
      excludeRegex: live ? checkPattern(guildId, live, starboard.exclude_regex) : null,
    });

    if (decision.delete) {
      return link ? removeMirror(target, link) : 'unchanged';
    }

    const content = buildPlainText({
      emoji: starboard.display_emoji,
      points,
      channelId: message.channel_id,
      forced: decision.forced,
      frozen: decision.frozen,
    });
    const color = starboard.color ?? deps.themeColor;

    if (!link) {
      if (!decision.add || !live) return 'unchanged';
      return createMirror(target, message, starboard, { content, embed: renderMirror(live, color) }, points);
    }

    if (live && starboard.link_edits) {
      return editMirror(target, link.id, { content, embed: renderMirror(live, color) });
    }
    return editMirror(target, link.id, { content });
  }

  return {
    /**
     * Brings the mirror of `message` on `starboard` in line with the stored state.
     * Calls for the same pair are serialized and always re-read the message row.
     */
    async reconcile(message, starboard) {
      return withKeyedLock(`${message.id}:${starboard.id}`, async () => {
        const current = store.getMessage(message.id);
        if (!current) return 'unchanged';
        const outcome = await sync(current, starboard);
        logger.debug(`Reconciled ${current.id} on ${starboard.id}: ${outcome}`);
        return outcome;
      });
    },
  };
}
