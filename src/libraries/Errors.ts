/**
 * Failures raised by the ledger. Each class mirrors a custom error of the
 * on-chain token: `name` is the error selector name and `args` the positional
 * arguments it was raised with.
 */
export abstract class LedgerError extends Error {
  readonly args: readonly unknown[];

  protected constructor(name: string, args: readonly unknown[] = [], message?: string) {
    super(message ?? `${name}(${args.map(String).join(", ")})`);
    this.name = name;
    this.args = args;
  }
}

// math

export class MathOverflow extends LedgerError {
  constructor(readonly operation: string) {
    super("MathOverflow", [operation]);
  }
}

export class DivisionByZero extends LedgerError {
  constructor() {
    super("DivisionByZero");
  }
}

export class SafeCastOverflowedUintDowncast extends LedgerError {
  constructor(
    readonly bits: number,
    readonly value: bigint
  ) {
    super("SafeCastOverflowedUintDowncast", [bits, value]);
  }
}

// access and initialization

export class CallerMustBePool extends LedgerError {
  constructor(readonly caller: string) {
    super("CallerMustBePool", [caller]);
  }
}

export class AlreadyInitialized extends LedgerError {
  constructor() {
    super("AlreadyInitialized");
  }
}

export class NotInitialized extends LedgerError {
  constructor() {
    super("NotInitialized");
  }
}

export class PoolAddressesDoNotMatch extends LedgerError {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super("PoolAddressesDoNotMatch", [expected, actual]);
  }
}

export class InvalidAddress extends LedgerError {
  constructor(readonly value: string) {
    super("InvalidAddress", [value]);
  }
}

export class InvalidParams extends LedgerError {
  constructor(readonly issues: readonly string[]) {
    super("InvalidParams", issues, `InvalidParams: ${issues.join("; ")}`);
  }
}

// debt accounting

export class InvalidMintAmount extends LedgerError {
  constructor() {
    super("InvalidMintAmount");
  }
}

export class InvalidBurnAmount extends LedgerError {
  constructor() {
    super("InvalidBurnAmount");
  }
}

export class BurnAmountExceedsBalance extends LedgerError {
  constructor(
    readonly account: string,
    readonly balance: bigint,
    readonly amount: bigint
  ) {
    super("BurnAmountExceedsBalance", [account, balance, amount]);
  }
}

export class InvalidCrossChainMode extends LedgerError {
  constructor(readonly mode: bigint) {
    super("InvalidCrossChainMode", [mode]);
  }
}

export class InvalidCrossChainAmount extends LedgerError {
  constructor() {
    super("InvalidCrossChainAmount");
  }
}

// credit delegation

export class InsufficientBorrowAllowance extends LedgerError {
  constructor(
    readonly delegator: string,
    readonly delegatee: string,
    readonly allowance: bigint,
    readonly amount: bigint
  ) {
    super("InsufficientBorrowAllowance", [delegator, delegatee, allowance, amount]);
  }
}

export class InvalidExpiration extends LedgerError {
  constructor(readonly deadline: bigint) {
    super("InvalidExpiration", [deadline]);
  }
}

export class InvalidSignature extends LedgerError {
  constructor() {
    super("InvalidSignature");
  }
}

export class OperationNotSupported extends LedgerError {
  constructor(readonly operation: string) {
    super("OperationNotSupported", [operation]);
  }
}
