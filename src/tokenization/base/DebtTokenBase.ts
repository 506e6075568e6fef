import { EventEmitter } from "node:events";
import { ethers } from "ethers";
import type { Logger } from "pino";
import { parseOrThrow, StableDebtTokenOptionsSchema } from "../../config/schemas";
import type { StableDebtTokenOptions } from "../../config/schemas";
import type { ICreditDelegationToken } from "../../interfaces/ICreditDelegationToken";
import type {
  StableDebtTokenEventName,
  StableDebtTokenEvents,
  StableDebtTokenListener,
} from "../../interfaces/events";
import {
  CallerMustBePool,
  InsufficientBorrowAllowance,
  InvalidAddress,
  InvalidExpiration,
  InvalidSignature,
  NotInitialized,
  OperationNotSupported,
} from "../../libraries/Errors";
import { checkUint256 } from "../../libraries/math/WadRayMath";
import { createLogger } from "../../observability/logger";
import { normaliseAddress, ZERO_ADDRESS } from "../../utils/bytes";
import type { Clock } from "../../utils/time";
import { DebtTokenStorage } from "./DebtTokenStorage";

export const EIP712_REVISION = "1";

export const DELEGATION_WITH_SIG_TYPES: Record<string, ethers.TypedDataField[]> = {
  DelegationWithSig: [
    { name: "delegatee", type: "address" },
    { name: "value", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
};

/**
 * State shared by every handle connected to the same token.
 */
export class DebtTokenContext {
  readonly storage = new DebtTokenStorage();
  readonly emitter = new EventEmitter();
  private pending: { name: StableDebtTokenEventName; args: readonly unknown[] }[] | undefined;

  private constructor(
    readonly address: string,
    readonly pool: string,
    readonly chainId: bigint,
    readonly clock: Clock,
    readonly logger: Logger
  ) {}

  static create(options: StableDebtTokenOptions): DebtTokenContext {
    const { address, pool, chainId, clock, logger } = parseOrThrow(StableDebtTokenOptionsSchema, options);
    return new DebtTokenContext(
      address,
      pool,
      chainId,
      clock,
      logger ?? createLogger({ token: address }).child({ pool })
    );
  }

  /**
   * Runs `fn` as one transaction: events are delivered only if it succeeds and
   * every storage write is undone if it throws. Once committed, the result is
   * returned whatever the listeners do.
   */
  transact<T>(operation: string, sender: string, fn: () => T): T {
    this.storage.begin();
    this.pending = [];
    let result: T;
    let logs: { name: StableDebtTokenEventName; args: readonly unknown[] }[];
    try {
      result = fn();
      logs = this.pending;
    } catch (error) {
      this.storage.rollback();
      this.pending = undefined;
      this.logger.warn({ operation, sender, err: error }, "transaction reverted");
      throw error;
    }
    this.storage.commit();
    this.pending = undefined;

    for (const log of logs) this.deliver(log.name, log.args);
    return result;
  }

  /**
   * Calls every listener of a committed event. A listener that throws is
   * logged and does not stop the others.
   */
  private deliver(name: StableDebtTokenEventName, args: readonly unknown[]): void {
    for (const listener of this.emitter.rawListeners(name)) {
      try {
        listener.apply(this.emitter, args);
      } catch (error) {
        this.logger.error({ event: name, err: error }, "event listener failed");
      }
    }
  }

  emit<E extends StableDebtTokenEventName>(name: E, ...args: StableDebtTokenEvents[E]): void {
    if (this.pending === undefined) throw Error(`Event ${name} emitted outside a transaction`);
    this.pending.push({ name, args });
  }
}

/**
 * Base for debt tokens: pool-only mutations, credit delegation and the
 * rejection of ERC-20 transfers and approvals.
 */
export abstract class DebtTokenBase implements ICreditDelegationToken {
  protected constructor(
    protected readonly context: DebtTokenContext,
    readonly sender: string
  ) {}

  protected get storage(): DebtTokenStorage {
    return this.context.storage;
  }

  protected get logger(): Logger {
    return this.context.logger;
  }

  protected now(): bigint {
    return this.context.clock.now();
  }

  get address(): string {
    return this.context.address;
  }

  POOL(): string {
    return this.context.pool;
  }

  // events

  on<E extends StableDebtTokenEventName>(name: E, listener: StableDebtTokenListener<E>): this {
    this.context.emitter.on(name, listener);
    return this;
  }

  once<E extends StableDebtTokenEventName>(name: E, listener: StableDebtTokenListener<E>): this {
    this.context.emitter.once(name, listener);
    return this;
  }

  off<E extends StableDebtTokenEventName>(name: E, listener: StableDebtTokenListener<E>): this {
    this.context.emitter.off(name, listener);
    return this;
  }

  protected emit<E extends StableDebtTokenEventName>(name: E, ...args: StableDebtTokenEvents[E]): void {
    this.context.emit(name, ...args);
  }

  protected transact<T>(operation: string, fn: () => T): T {
    return this.context.transact(operation, this.sender, fn);
  }

  protected onlyPool(): void {
    if (this.sender !== this.context.pool) throw new CallerMustBePool(this.sender);
  }

  protected whenInitialized(): void {
    if (!this.storage.initialized) throw new NotInitialized();
  }

  // ERC-20 metadata

  name(): string {
    return this.storage.name;
  }

  symbol(): string {
    return this.storage.symbol;
  }

  decimals(): number {
    return this.storage.decimals;
  }

  // credit delegation

  approveDelegation(delegatee: string, amount: bigint): void {
    this.transact("approveDelegation", () => {
      this.whenInitialized();
      const to = normaliseAddress(delegatee);
      this.approveDelegationInternal(this.sender, to, checkUint256(amount, "approveDelegation"));
    });
  }

  delegationWithSig(delegator: string, delegatee: string, value: bigint, deadline: bigint, signature: string): void {
    this.transact("delegationWithSig", () => {
      this.whenInitialized();
      const from = normaliseAddress(delegator);
      const to = normaliseAddress(delegatee);
      if (from === ZERO_ADDRESS) throw new InvalidAddress(delegator);
      if (this.now() > deadline) throw new InvalidExpiration(deadline);
      checkUint256(value, "delegationWithSig");

      const nonce = this.storage.getNonce(from);
      const message = { delegatee: to, value, nonce, deadline };
      if (recoverSigner(this.domain(), message, signature) !== from) throw new InvalidSignature();

      this.storage.setNonce(from, nonce + BigInt(1));
      this.approveDelegationInternal(from, to, value);
    });
  }

  borrowAllowance(fromUser: string, toUser: string): bigint {
    return this.storage.getBorrowAllowance(normaliseAddress(fromUser), normaliseAddress(toUser));
  }

  nonces(owner: string): bigint {
    return this.storage.getNonce(normaliseAddress(owner));
  }

  DOMAIN_SEPARATOR(): string {
    return ethers.TypedDataEncoder.hashDomain(this.domain());
  }

  /**
   * EIP-712 domain signatures for delegationWithSig are made against.
   */
  domain(): ethers.TypedDataDomain {
    return {
      name: this.storage.name,
      version: EIP712_REVISION,
      chainId: this.context.chainId,
      verifyingContract: this.context.address,
    };
  }

  protected approveDelegationInternal(delegator: string, delegatee: string, amount: bigint): void {
    this.storage.setBorrowAllowance(delegator, delegatee, amount);
    this.emit("BorrowAllowanceDelegated", delegator, delegatee, this.storage.underlyingAsset, amount);
  }

  protected decreaseBorrowAllowance(delegator: string, delegatee: string, amount: bigint): void {
    const allowance = this.storage.getBorrowAllowance(delegator, delegatee);
    if (allowance < amount) throw new InsufficientBorrowAllowance(delegator, delegatee, allowance, amount);

    const newAllowance = allowance - amount;
    this.storage.setBorrowAllowance(delegator, delegatee, newAllowance);
    this.emit("BorrowAllowanceDelegated", delegator, delegatee, this.storage.underlyingAsset, newAllowance);
  }

  // debt is not transferable

  transfer(_recipient: string, _amount: bigint): boolean {
    throw new OperationNotSupported("transfer");
  }

  allowance(_owner: string, _spender: string): bigint {
    throw new OperationNotSupported("allowance");
  }

  approve(_spender: string, _amount: bigint): boolean {
    throw new OperationNotSupported("approve");
  }

  transferFrom(_sender: string, _recipient: string, _amount: bigint): boolean {
    throw new OperationNotSupported("transferFrom");
  }

  increaseAllowance(_spender: string, _addedValue: bigint): boolean {
    throw new OperationNotSupported("increaseAllowance");
  }

  decreaseAllowance(_spender: string, _subtractedValue: bigint): boolean {
    throw new OperationNotSupported("decreaseAllowance");
  }
}

function recoverSigner(
  domain: ethers.TypedDataDomain,
  message: Record<string, unknown>,
  signature: string
): string | undefined {
  try {
    return ethers.verifyTypedData(domain, DELEGATION_WITH_SIG_TYPES, message, signature);
  } catch (error) {
    // malformed signatures are reported as invalid, anything else propagates
    if (ethers.isError(error, "INVALID_ARGUMENT")) return undefined;
    throw error;
  }
}
