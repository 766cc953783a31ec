/**
 * Error taxonomy for the invite sync scripts. Every error here aborts a run with `exitCode`.
 */

export class InviteSyncError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'InviteSyncError';
  }
}

export class ConfigurationMissingError extends InviteSyncError {
  constructor(public readonly missing: string[]) {
    super(`Missing required setting(s): ${missing.join(', ')} (set them in the environment or the env file)`);
    this.name = 'ConfigurationMissingError';
  }
}

export class ConfigurationInvalidError extends InviteSyncError {
  constructor(public readonly issues: string[]) {
    super(`Invalid setting(s): ${issues.join('; ')}`);
    this.name = 'ConfigurationInvalidError';
  }
}

export class InputNotFoundError extends InviteSyncError {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'InputNotFoundError';
  }
}

export class SchemaMismatchError extends InviteSyncError {
  constructor(message: string, public readonly columns: string[]) {
    super(message);
    this.name = 'SchemaMismatchError';
  }
}

export class TransportError extends InviteSyncError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string
  ) {
    super(message);
    this.name = 'TransportError';
  }
}
