// ============================================================================
// @phasemint/engine — Error Taxonomy
// ============================================================================

/** Machine-readable reasons, grouped by error class. */
export type ConfigErrorCode = 'InvalidConfig' | 'InvalidAddress' | 'InvalidAmount';
export type AuthorizationErrorCode = 'NotOwner' | 'NotPlatformAdmin' | 'NotTokenOwner';
export type PhaseErrorCode =
  | 'Inactive'
  | 'Unknown'
  | 'LimitExceeded'
  | 'CapacityExceeded'
  | 'Live'
  | 'InvalidWindow';
export type SupplyErrorCode = 'SoldOut' | 'InvalidCap' | 'AmountTooHigh';
export type PaymentErrorCode = 'Insufficient' | 'TransferFailed';
export type AllowListErrorCode = 'NotEligible';
export type StateErrorCode =
  | 'Paused'
  | 'NotPaused'
  | 'AlreadyPaused'
  | 'Reentrant'
  | 'TradingLocked'
  | 'TokenExists'
  | 'UnknownToken';

export type MintEngineErrorCode =
  | ConfigErrorCode
  | AuthorizationErrorCode
  | PhaseErrorCode
  | SupplyErrorCode
  | PaymentErrorCode
  | AllowListErrorCode
  | StateErrorCode;

/**
 * Root of every error the engine raises.
 *
 * A rejected call leaves the instance untouched, so callers may inspect
 * `code` and retry or move on.
 */
export class MintEngineError extends Error {
  public readonly code: MintEngineErrorCode;
  /** Optional underlying error/cause. */
  public readonly cause?: unknown;

  constructor(code: MintEngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(`PhaseMint: ${message}`);
    this.name = new.target.name;
    this.code = code;
    this.cause = options?.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Invalid construction or call parameters. */
export class ConfigError extends MintEngineError {
  declare readonly code: ConfigErrorCode;
  /** Individual validation failures, as `path: message` strings. */
  public readonly issues: string[];

  constructor(
    code: ConfigErrorCode,
    message: string,
    options?: { cause?: unknown; issues?: string[] },
  ) {
    super(code, message, options);
    this.issues = options?.issues ?? [];
  }
}

/** The caller lacks the role an entry point requires. */
export class AuthorizationError extends MintEngineError {
  declare readonly code: AuthorizationErrorCode;

  constructor(code: AuthorizationErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class PhaseError extends MintEngineError {
  declare readonly code: PhaseErrorCode;

  constructor(code: PhaseErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class SupplyError extends MintEngineError {
  declare readonly code: SupplyErrorCode;

  constructor(code: SupplyErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

/** Attached value too low, or a settlement transfer failed. */
export class PaymentError extends MintEngineError {
  declare readonly code: PaymentErrorCode;

  constructor(code: PaymentErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

/** The supplied Merkle proof does not resolve to the phase root. */
export class AllowListError extends MintEngineError {
  declare readonly code: AllowListErrorCode;

  constructor(code: AllowListErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class StateError extends MintEngineError {
  declare readonly code: StateErrorCode;

  constructor(code: StateErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}
