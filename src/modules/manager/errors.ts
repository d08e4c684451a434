/**
 * Error taxonomy of the version manager. Every rejection carries a
 * reason tag; the kind groups reasons by what the caller can do next.
 */

export type ErrorKind =
  | "ConfigurationError"
  | "AuthorizationError"
  | "VersionError"
  | "InitializationError"
  | "StorageError";

const REASON_KIND = {
  NotCatalogOwner: "ConfigurationError",
  DuplicateStorageOrModule: "ConfigurationError",
  InvalidInitSubset: "ConfigurationError",
  EmptyFeatureSet: "ConfigurationError",
  DuplicateStaticCall: "ConfigurationError",
  InvalidSelector: "ConfigurationError",
  InvariantViolation: "ConfigurationError",
  NotInitialized: "ConfigurationError",

  AccountNotUpgraded: "AuthorizationError",
  ModuleNotAuthorized: "AuthorizationError",
  StaticCallRequired: "AuthorizationError",
  ReadOnlyContext: "AuthorizationError",
  AccountLocked: "AuthorizationError",
  NotOwnerAuthority: "AuthorizationError",
  StaticCallNotSupported: "AuthorizationError",

  InvalidVersion: "VersionError",
  AlreadyOnVersion: "VersionError",
  UpgradeInProgress: "VersionError",

  InitializationFailed: "InitializationError",

  UnregisteredStorage: "StorageError",
  TargetMismatch: "StorageError",
  StorageCallFailed: "StorageError",
} as const satisfies Record<string, ErrorKind>;

export type RejectionReason = keyof typeof REASON_KIND;

export function kindOf(reason: RejectionReason): ErrorKind {
  return REASON_KIND[reason];
}

/** Outcome of a gate-style check */
export type GateResult<T = object> =
  | ({ readonly ok: true } & T)
  | Rejection;

export interface Rejection {
  readonly ok: false;
  readonly reason: RejectionReason;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  /** Underlying error, when the rejection wraps a thrown one */
  readonly cause?: unknown;
}

export function reject(
  reason: RejectionReason,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): Rejection {
  return {
    ok: false,
    reason,
    message,
    ...(details ? { details } : {}),
    ...(cause !== undefined ? { cause } : {}),
  };
}

/** Thrown by the manager's entry points */
export class WalletCoreError extends Error {
  readonly kind: ErrorKind;

  constructor(
    readonly reason: RejectionReason,
    detail: string,
    readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(`${reason}: ${detail}`, options);
    this.name = "WalletCoreError";
    this.kind = kindOf(reason);
  }

  static from(rejection: Rejection): WalletCoreError {
    return new WalletCoreError(
      rejection.reason,
      rejection.message,
      rejection.details,
      rejection.cause === undefined ? undefined : { cause: rejection.cause },
    );
  }
}

export function isWalletCoreError(err: unknown): err is WalletCoreError {
  return err instanceof WalletCoreError;
}
