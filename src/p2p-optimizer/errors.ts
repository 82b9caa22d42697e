export type ErrorKind = "validation" | "policy" | "authorization";

export type ValidationReason =
  | "AddressIsZero"
  | "InvalidAddress"
  | "AmountIsZero"
  | "MarketNotCreated"
  | "MarketIsNotListedOnPool"
  | "InvalidMaxLoops"
  | "ExceedsMaxBasisPoints"
  | "DebtIsZero"
  | "SupplyIsZero"
  | "CollateralIsZero";

export type PolicyReason =
  | "SupplyIsPaused"
  | "SupplyCollateralIsPaused"
  | "BorrowIsPaused"
  | "RepayIsPaused"
  | "WithdrawIsPaused"
  | "WithdrawCollateralIsPaused"
  | "LiquidateCollateralIsPaused"
  | "LiquidateBorrowIsPaused"
  | "AssetNotCollateral"
  | "BorrowNotEnabled"
  | "InconsistentEMode"
  | "ExceedsSupplyCap"
  | "ExceedsBorrowCap"
  | "BorrowNotPaused"
  | "MarketIsDeprecated"
  | "ReentrantCall";

export type AuthorizationReason =
  | "PermissionDenied"
  | "UnauthorizedBorrow"
  | "UnauthorizedWithdraw"
  | "UnauthorizedLiquidate"
  | "SentinelBorrowNotEnabled"
  | "SentinelLiquidateNotEnabled";

export type ErrorReason = ValidationReason | PolicyReason | AuthorizationReason;

/**
 * Every rejection raised by the optimizer. `reason` is stable and meant to be branched on;
 * `kind` tells whether retrying with other parameters can help.
 */
export abstract class OptimizerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(readonly reason: ErrorReason, message?: string) {
    super(message ? `${reason}: ${message}` : reason);
    this.name = new.target.name;
  }
}

export class ValidationError extends OptimizerError {
  readonly kind = "validation";

  constructor(readonly reason: ValidationReason, message?: string) {
    super(reason, message);
  }
}

export class PolicyError extends OptimizerError {
  readonly kind = "policy";

  constructor(readonly reason: PolicyReason, message?: string) {
    super(reason, message);
  }
}

export class AuthorizationError extends OptimizerError {
  readonly kind = "authorization";

  constructor(readonly reason: AuthorizationReason, message?: string) {
    super(reason, message);
  }
}

export const isOptimizerError = (error: unknown): error is OptimizerError =>
  error instanceof OptimizerError;
