/**
 * Vault error taxonomy
 *
 * A denied path and a missing path produce the same caller-visible message,
 * so a response never reveals whether a path outside the whitelist exists.
 * Keep the two message builders below shared between both classes.
 */

export type VaultErrorKind =
  | 'permission_denied'
  | 'not_found'
  | 'upstream_failure'
  | 'invalid_argument';

export abstract class VaultError extends Error {
  abstract readonly kind: VaultErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export function unavailablePathMessage(path: string): string {
  return `Not found or access denied: ${path}`;
}

export function unavailablePeriodicNoteMessage(period: string): string {
  return `No ${period} note is available`;
}

export class PermissionDeniedError extends VaultError {
  readonly kind = 'permission_denied' as const;

  constructor(public readonly path: string, message: string = unavailablePathMessage(path)) {
    super(message);
  }
}

export class NotFoundError extends VaultError {
  readonly kind = 'not_found' as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}

export class UpstreamError extends VaultError {
  readonly kind = 'upstream_failure' as const;

  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode?: number,
    cause?: unknown
  ) {
    super(message, cause);
  }
}

export class InvalidArgumentError extends VaultError {
  readonly kind = 'invalid_argument' as const;
}

export function isVaultError(error: unknown): error is VaultError {
  return error instanceof VaultError;
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
