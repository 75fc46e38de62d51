import { beforeEach, describe, expect, it } from 'vitest';
import { memberRepository } from '../../../src/database/repositories/memberRepository.js';
import { messageRepository } from '../../../src/database/repositories/messageRepository.js';
import { starboardMessageRepository } from '../../../src/database/repositories/starboardMessageRepository.js';
import { starboardRepository } from '../../../src/database/repositories/starboardRepository.js';
import { sqliteStore } from '../../../src/database/store.js';
import { createReconciler } from '../../../src/starboard/reconciler.js';
import { createStarboardService, type StarboardService } from '../../../src/starboard/starboardService.js';
import type { StarboardEvent } from '../../../src/types/starboard.js';
import { StoreError } from '../../../src/utils/errors.js';
import { AUTHOR_ID, CHANNEL_ID, GUILD_ID, resetDatabase, seedMessage, seedStarboard } from '../../helpers/database.js';
import { FakeGateway, FakeMessageCache, liveMessage, recordingNotifier } from '../../helpers/fakes.js';

type ReactionAdded = Extract<StarboardEvent, { type: 'reaction-added' }>;

let cache: FakeMessageCache;
let gateway: FakeGateway;
let service: StarboardService;

function reactionAdded(userId: string, overrides: Partial<ReactionAdded> = {}): ReactionAdded {
  return {
    type: 'reaction-added',
    guildId: GUILD_ID,
    channelId: CHANNEL_ID,
    messageId: 'msg-1',
    authorId: AUTHOR_ID,
    authorIsBot: false,
    channelNsfw: false,
    emoji: '⭐',
    userId,
    ...overrides,
  };
}

async function starByThree(): Promise<void> {
  for (const userId of ['user-a', 'user-b', 'user-c']) {
    await service.handleEvent(reactionAdded(userId));
  }
}

beforeEach(() => {
  resetDatabase();
  seedStarboard();
  cache = new FakeMessageCache();
  cache.add(liveMessage());
  gateway = new FakeGateway(cache);
  const reconciler = createReconciler({
    store: sqliteStore,
    cache,
    channels: gateway,
    notify: recordingNotifier().notify,
    regexTimeoutMs: 50,
    themeColor: 0xffe19c,
  });
  service = createStarboardService({ store: sqliteStore, reconciler });
});

describe('reaction events', () => {
  it('records the message lazily and posts it at the threshold', async () => {
    await service.handleEvent(reactionAdded('user-a'));
    await service.handleEvent(reactionAdded('user-b'));

    expect(messageRepository.findById('msg-1')).toMatchObject({ author_id: AUTHOR_ID, channel_id: CHANNEL_ID });
    expect(gateway.sent).toEqual([]);

    await service.handleEvent(reactionAdded('user-c'));

    expect(gateway.sent).toHaveLength(1);
    expect(gateway.sent[0].payload.content).toBe('**⭐ 3 | <#chan-1>**');
  });

  it('ignores emojis that no starboard counts', async () => {
    await service.handleEvent(reactionAdded('user-a', { emoji: '👍' }));

    expect(messageRepository.findById('msg-1')).toBeUndefined();
  });

  it('tracks stars given and received', async () => {
    await starByThree();
    await service.handleEvent(reactionAdded('user-a'));
    await service.handleEvent(reactionAdded(AUTHOR_ID));

    expect(memberRepository.find(AUTHOR_ID, GUILD_ID)).toMatchObject({ stars_given: 0, stars_received: 3 });
    expect(memberRepository.find('user-a', GUILD_ID)).toMatchObject({ stars_given: 1, stars_received: 0 });
  });

  it('gives back every star when the source reactions are cleared', async () => {
    await starByThree();

    await service.handleEvent({ type: 'reactions-cleared', guildId: GUILD_ID, messageId: 'msg-1' });

    expect(memberRepository.find(AUTHOR_ID, GUILD_ID)?.stars_received).toBe(0);
    expect(memberRepository.find('user-a', GUILD_ID)?.stars_given).toBe(0);
  });

  it('counts one star per user across star emojis', async () => {
    starboardRepository.update('sb-1', { star_emojis: ['⭐', '🌟'] });

    await service.handleEvent(reactionAdded('user-a'));
    await service.handleEvent(reactionAdded('user-a', { emoji: '🌟' }));
    expect(memberRepository.find(AUTHOR_ID, GUILD_ID)?.stars_received).toBe(1);
    expect(memberRepository.find('user-a', GUILD_ID)?.stars_given).toBe(1);

    await service.handleEvent({ type: 'reaction-removed', guildId: GUILD_ID, messageId: 'msg-1', emoji: '⭐', userId: 'user-a' });
    expect(memberRepository.find(AUTHOR_ID, GUILD_ID)?.stars_received).toBe(1);

    await service.handleEvent({ type: 'reaction-removed', guildId: GUILD_ID, messageId: 'msg-1', emoji: '🌟', userId: 'user-a' });
    expect(memberRepository.find(AUTHOR_ID, GUILD_ID)?.stars_received).toBe(0);
    expect(memberRepository.find('user-a', GUILD_ID)?.stars_given).toBe(0);
  });

  it('keeps the star of a user whose other star emoji survives a clear', async () => {
    starboardRepository.update('sb-1', { star_emojis: ['⭐', '🌟'] });
    await service.handleEvent(reactionAdded('user-a'));
    await service.handleEvent(reactionAdded('user-a', { emoji: '🌟' }));
    await service.handleEvent(reactionAdded('user-b'));

    await service.handleEvent({ type: 'reactions-cleared', guildId: GUILD_ID, messageId: 'msg-1', emoji: '⭐' });

    expect(memberRepository.find('user-a', GUILD_ID)?.stars_given).toBe(1);
    expect(memberRepository.find('user-b', GUILD_ID)?.stars_given).toBe(0);
    expect(memberRepository.find(AUTHOR_ID, GUILD_ID)?.stars_received).toBe(1);
  });

  it('counts a reaction on the mirror toward the original', async () => {
    await starByThree();

    await service.handleEvent(
      reactionAdded('user-d', { messageId: 'mirror-1', channelId: 'sb-1', authorId: 'bot-self', authorIsBot: true }),
    );

    expect(messageRepository.findById('mirror-1')).toBeUndefined();
    expect(starboardMessageRepository.findByOrig('msg-1', 'sb-1')?.points).toBe(4);
    expect(memberRepository.find(AUTHOR_ID, GUILD_ID)?.stars_received).toBe(4);
  });

  it('updates the mirror when a reaction is removed', async () => {
    await starByThree();

    await service.handleEvent({ type: 'reaction-removed', guildId: GUILD_ID, messageId: 'msg-1', emoji: '⭐', userId: 'user-c' });

    expect(gateway.edits.at(-1)?.payload.content).toBe('**⭐ 2 | <#chan-1>**');
    expect(memberRepository.find(AUTHOR_ID, GUILD_ID)?.stars_received).toBe(2);
    expect(memberRepository.find('user-c', GUILD_ID)?.stars_given).toBe(0);
  });

  it('removes the mirror when the source reactions are cleared', async () => {
    await starByThree();

    await service.handleEvent({ type: 'reactions-cleared', guildId: GUILD_ID, messageId: 'msg-1' });

    expect(gateway.deleted).toEqual(['mirror-1']);
  });

  it('keeps the votes when the mirror reactions are cleared', async () => {
    await starByThree();

    await service.handleEvent({ type: 'reactions-cleared', guildId: GUILD_ID, messageId: 'mirror-1' });

    expect(gateway.deleted).toEqual([]);
    expect(starboardMessageRepository.findByOrig('msg-1', 'sb-1')?.points).toBe(3);
  });
});

describe('message events', () => {
  it('re-renders an edited message', async () => {
    await starByThree();
    cache.add(liveMessage({ content: 'edited content' }));

    await service.handleEvent({ type: 'message-edited', guildId: GUILD_ID, messageId: 'msg-1' });

    expect(gateway.edits.at(-1)?.payload.embed?.description).toBe('edited content');
  });

  it('ignores edits of unknown messages', async () => {
    await service.handleEvent({ type: 'message-edited', guildId: GUILD_ID, messageId: 'msg-404' });

    expect(gateway.edits).toEqual([]);
  });

  it('removes the mirror of a deleted source when link_deletes is on', async () => {
    starboardRepository.update('sb-1', { link_deletes: true });
    await starByThree();
    cache.remove('msg-1');

    await service.handleEvent({ type: 'message-deleted', guildId: GUILD_ID, messageId: 'msg-1' });

    expect(gateway.deleted).toEqual(['mirror-1']);
  });
});

describe('updateMessage', () => {
  it('reconciles every starboard of the guild', async () => {
    seedStarboard({ required: 1 }, 'sb-2');
    await service.handleEvent(reactionAdded('user-a'));
    const message = messageRepository.findById('msg-1');
    if (!message) throw new Error('message missing');

    await expect(service.updateMessage(message)).resolves.toEqual([
      { starboardId: 'sb-1', outcome: 'unchanged' },
      { starboardId: 'sb-2', outcome: 'updated' },
    ]);
  });

  it('records a failed starboard and carries on', async () => {
    const message = seedMessage();
    const failing = createStarboardService({
      store: sqliteStore,
      reconciler: {
        reconcile: async () => {
          throw new Error('boom');
        },
      },
    });

    await expect(failing.updateMessage(message)).resolves.toEqual([{ starboardId: 'sb-1', outcome: 'failed' }]);
  });
});

describe('handleEvent', () => {
  it('does not let a store failure escape', async () => {
    const broken = createStarboardService({
      store: {
        ...sqliteStore,
        getMessage: () => {
          throw new StoreError('getMessage failed: disk I/O error');
        },
      },
      reconciler: { reconcile: async () => 'unchanged' },
    });

    await expect(
      broken.handleEvent({ type: 'message-edited', guildId: GUILD_ID, messageId: 'msg-1' }),
    ).resolves.toBeUndefined();
  });
});

describe('moderation', () => {
  it('forces a message onto a starboard', async () => {
    seedMessage();

    await expect(service.setForced('msg-1', 'sb-1', true)).resolves.toBe(true);

    expect(gateway.sent[0].payload.content).toBe('**⭐ 0 | <#chan-1>** 🔒');
    expect(messageRepository.findById('msg-1')?.forced).toEqual(['sb-1']);
  });

  it('returns false for unknown messages', async () => {
    await expect(service.setForced('msg-404', 'sb-1', true)).resolves.toBe(false);
    await expect(service.setFrozen('msg-404', true)).resolves.toBe(false);
    await expect(service.setTrashed('msg-404', true)).resolves.toBe(false);
  });

  it('freezes through the mirror id', async () => {
    await starByThree();

    await expect(service.setFrozen('mirror-1', true)).resolves.toBe(true);

    expect(messageRepository.findById('msg-1')?.frozen).toBe(true);
    expect(gateway.edits.at(-1)?.payload.content).toBe('**⭐ 3 | <#chan-1>** ❄️');
  });

  it('trashes and restores a message', async () => {
    await starByThree();

    await service.setTrashed('msg-1', true);
    expect(gateway.deleted).toEqual(['mirror-1']);

    await service.setTrashed('msg-1', false);
    expect(starboardMessageRepository.findByOrig('msg-1', 'sb-1')?.id).toBe('mirror-2');
  });
});

describe('randomStarred', () => {
  it('applies the filters', async () => {
    await starByThree();

    expect(service.randomStarred(GUILD_ID)).toEqual({ id: 'mirror-1', orig_id: 'msg-1', starboard_id: 'sb-1', points: 3 });
    expect(service.randomStarred(GUILD_ID, { minPoints: 3, authorId: AUTHOR_ID, starboardId: 'sb-1' })?.id).toBe('mirror-1');
    expect(service.randomStarred(GUILD_ID, { minPoints: 4 })).toBeUndefined();
    expect(service.randomStarred(GUILD_ID, { authorId: 'user-x' })).toBeUndefined();
    expect(service.randomStarred(GUILD_ID, { channelId: 'chan-2' })).toBeUndefined();
  });
});
