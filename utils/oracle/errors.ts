/**
 * Base class of every failure raised by the nebula oracles and the registry
 * - `code` is stable and safe to match on, `message` is for humans
 */
export class OracleError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "OracleError";
  }
}

// State preconditions

export class PairAlreadyInitializedError extends OracleError {
  constructor(readonly lpToken: string) {
    super(
      "PAIR_ALREADY_INITIALIZED",
      `Liquidity token ${lpToken} is already initialized`,
    );
    this.name = "PairAlreadyInitializedError";
  }
}

export class PairNotInitializedError extends OracleError {
  constructor(readonly lpToken: string) {
    super(
      "PAIR_NOT_INITIALIZED",
      `Liquidity token ${lpToken} is not initialized`,
    );
    this.name = "PairNotInitializedError";
  }
}

export class OracleAlreadyAddedError extends OracleError {
  constructor(readonly nebula: string) {
    super("ORACLE_ALREADY_ADDED", `Nebula ${nebula} is already added`);
    this.name = "OracleAlreadyAddedError";
  }
}

export class NebulaNotFoundError extends OracleError {
  constructor(readonly nebulaId: number) {
    super("NEBULA_NOT_FOUND", `No nebula with id ${nebulaId}`);
    this.name = "NebulaNotFoundError";
  }
}

// Authorization

export class MsgSenderNotAdminError extends OracleError {
  constructor(readonly sender: string) {
    super("MSG_SENDER_NOT_ADMIN", `${sender} is not the admin`);
    this.name = "MsgSenderNotAdminError";
  }
}

export class MsgSenderNotRegistrarError extends OracleError {
  constructor(readonly sender: string) {
    super("MSG_SENDER_NOT_REGISTRAR", `${sender} is not the registrar`);
    this.name = "MsgSenderNotRegistrarError";
  }
}

// Admin transfer

export class PendingAdminAlreadySetError extends OracleError {
  constructor(readonly pendingAdmin: string) {
    super(
      "PENDING_ADMIN_ALREADY_SET",
      `${pendingAdmin} is already the pending admin`,
    );
    this.name = "PendingAdminAlreadySetError";
  }
}

export class AdminCantBeZeroError extends OracleError {
  constructor() {
    super("ADMIN_CANT_BE_ZERO", "No pending admin to accept");
    this.name = "AdminCantBeZeroError";
  }
}

// Decimals

export class DecimalsZeroError extends OracleError {
  constructor(readonly asset: string) {
    super("DECIMALS_ZERO", `${asset} reports 0 decimals`);
    this.name = "DecimalsZeroError";
  }
}

export class DecimalsTooLargeError extends OracleError {
  constructor(
    readonly asset: string,
    readonly decimals: number,
  ) {
    super(
      "DECIMALS_TOO_LARGE",
      `${asset} reports ${decimals} decimals, the maximum is 18`,
    );
    this.name = "DecimalsTooLargeError";
  }
}

export class InvalidDecimalsError extends OracleError {
  constructor(
    readonly asset: string,
    readonly decimals: number,
  ) {
    super(
      "INVALID_DECIMALS",
      `${asset} reports ${decimals} decimals, not a non-negative integer`,
    );
    this.name = "InvalidDecimalsError";
  }
}

// Feeds

export class InvalidFeedValueError extends OracleError {
  constructor(
    readonly feed: string,
    readonly answer: bigint,
  ) {
    super("INVALID_FEED_VALUE", `Feed ${feed} answered ${answer}`);
    this.name = "InvalidFeedValueError";
  }
}

// Read path

export class AlreadyInContextError extends OracleError {
  constructor(readonly pool: string) {
    super(
      "ALREADY_IN_CONTEXT",
      `Pool ${pool} is in the middle of an operation`,
    );
    this.name = "AlreadyInContextError";
  }
}

export class PriceCantBeZeroError extends OracleError {
  constructor(readonly lpToken: string) {
    super("PRICE_CANT_BE_ZERO", `Price of ${lpToken} is zero`);
    this.name = "PriceCantBeZeroError";
  }
}

// Input

export class InvalidAddressError extends OracleError {
  constructor(readonly value: string) {
    super("INVALID_ADDRESS", `Invalid address: ${value}`);
    this.name = "InvalidAddressError";
  }
}

export class InvalidPriceFeedsLengthError extends OracleError {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      "INVALID_PRICE_FEEDS_LENGTH",
      `Expected ${expected} price feeds, got ${actual}`,
    );
    this.name = "InvalidPriceFeedsLengthError";
  }
}
