import { DiscordAPIError } from 'discord.js';
import { describe, expect, it } from 'vitest';
import { PermissionDeniedError, RemoteNotFoundError, errorMessage, toRemoteError } from '../../../src/utils/errors.js';

function apiError(code: number, message: string, status: number): DiscordAPIError {
  return new DiscordAPIError({ code, message }, code, status, 'POST', '/channels/1/messages', {});
}

describe('toRemoteError', () => {
  it('maps missing permissions', () => {
    const mapped = toRemoteError(apiError(50013, 'Missing Permissions', 403), 'Send starboard message');

    expect(mapped).toBeInstanceOf(PermissionDeniedError);
    expect(mapped).toMatchObject({ permission: 'Missing Permissions' });
  });

  it('maps missing access', () => {
    const mapped = toRemoteError(apiError(50001, 'Missing Access', 403), 'Autoreact');

    expect(mapped).toMatchObject({ permission: 'Missing Access' });
  });

  it('maps unknown messages and channels to not found', () => {
    expect(toRemoteError(apiError(10008, 'Unknown Message', 404), 'Edit')).toBeInstanceOf(RemoteNotFoundError);
    expect(toRemoteError(apiError(10003, 'Unknown Channel', 404), 'Edit')).toBeInstanceOf(RemoteNotFoundError);
  });

  it('passes other errors through', () => {
    const rateLimited = apiError(20028, 'Rate limited', 429);
    const plain = new Error('socket hang up');

    expect(toRemoteError(rateLimited, 'Send')).toBe(rateLimited);
    expect(toRemoteError(plain, 'Send')).toBe(plain);
  });
});

describe('errorMessage', () => {
  it('reads errors and stringifies everything else', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope');
    expect(errorMessage(42)).toBe('42');
  });
});
