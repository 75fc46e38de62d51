import { DiscordAPIError, RESTJSONErrorCodes } from 'discord.js';

export class PermissionDeniedError extends Error {
  constructor(
    message: string,
    public readonly permission: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PermissionDeniedError';
  }
}

export class RemoteNotFoundError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'RemoteNotFoundError';
  }
}

export class StoreError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'StoreError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const PERMISSION_CODES = new Map<number | string, string>([
  [RESTJSONErrorCodes.MissingPermissions, 'Missing Permissions'],
  [RESTJSONErrorCodes.MissingAccess, 'Missing Access'],
]);

const NOT_FOUND_CODES = new Set<number | string>([
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownChannel,
]);

/**
 * Translates a Discord REST failure into the starboard error taxonomy.
 * Errors that are not recognised are returned unchanged.
 */
export function toRemoteError(err: unknown, action: string): unknown {
  if (!(err instanceof DiscordAPIError)) return err;

  const permission = PERMISSION_CODES.get(err.code);
  if (permission) {
    return new PermissionDeniedError(`${action} failed: ${err.message}`, permission, err);
  }
  if (NOT_FOUND_CODES.has(err.code)) {
    return new RemoteNotFoundError(`${action} failed: ${err.message}`, err);
  }
  return err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
