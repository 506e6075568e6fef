import type { IIncentivesController } from "../../interfaces/IIncentivesController";
import { ZERO_ADDRESS } from "../../utils/bytes";

export interface UserState {
  /** principal balance (0dp, uint128) */
  balance: bigint;
  /** stable rate of the position (27dp, uint128) */
  additionalData: bigint;
}

const EMPTY_USER_STATE: Readonly<UserState> = Object.freeze({ balance: BigInt(0), additionalData: BigInt(0) });

type Undo = () => void;

interface SupplyState {
  /** principal supply (0dp, uint128) */
  totalSupply: bigint;
  /** average stable rate (27dp, uint128) */
  avgStableRate: bigint;
  /** last supply update (0dp, uint40) */
  totalSupplyTimestamp: bigint;
  /** outstanding supply mirrored from other chains (0dp) */
  crossChainSupply: bigint;
}

/**
 * In-memory storage of a debt token. Writes made while a journal is open are
 * recorded so that a failed operation can be rolled back in full.
 */
export class DebtTokenStorage {
  initialized = false;
  name = "";
  symbol = "";
  decimals = 0;
  underlyingAsset = ZERO_ADDRESS;
  incentivesController: IIncentivesController | undefined = undefined;

  private readonly users = new Map<string, UserState>();
  private readonly timestamps = new Map<string, bigint>();
  private readonly borrowAllowances = new Map<string, Map<string, bigint>>();
  private readonly nonces = new Map<string, bigint>();

  private readonly supply: SupplyState = {
    totalSupply: BigInt(0),
    avgStableRate: BigInt(0),
    totalSupplyTimestamp: BigInt(0),
    crossChainSupply: BigInt(0),
  };

  private journal: Undo[] | undefined;

  begin(): void {
    if (this.journal !== undefined) throw Error("Nested storage transaction");
    this.journal = [];
  }

  commit(): void {
    this.journal = undefined;
  }

  rollback(): void {
    const journal = this.journal ?? [];
    this.journal = undefined;
    for (let i = journal.length - 1; i >= 0; i--) journal[i]();
  }

  private record(undo: Undo): void {
    this.journal?.push(undo);
  }

  private setField(key: keyof SupplyState, value: bigint): void {
    const { supply } = this;
    const previous = supply[key];
    this.record(() => {
      supply[key] = previous;
    });
    supply[key] = value;
  }

  private setEntry<V>(map: Map<string, V>, key: string, value: V): void {
    const had = map.has(key);
    const previous = map.get(key);
    this.record(() => {
      if (had && previous !== undefined) map.set(key, previous);
      else map.delete(key);
    });
    map.set(key, value);
  }

  configure(values: {
    name: string;
    symbol: string;
    decimals: number;
    underlyingAsset: string;
    incentivesController: IIncentivesController | undefined;
  }): void {
    const previous = {
      initialized: this.initialized,
      name: this.name,
      symbol: this.symbol,
      decimals: this.decimals,
      underlyingAsset: this.underlyingAsset,
      incentivesController: this.incentivesController,
    };
    this.record(() => Object.assign(this, previous));
    Object.assign(this, values, { initialized: true });
  }

  // users

  getUserState(account: string): Readonly<UserState> {
    return this.users.get(account) ?? EMPTY_USER_STATE;
  }

  setUserState(account: string, state: UserState): void {
    this.setEntry(this.users, account, { ...state });
  }

  getTimestamp(account: string): bigint {
    return this.timestamps.get(account) ?? BigInt(0);
  }

  setTimestamp(account: string, timestamp: bigint): void {
    this.setEntry(this.timestamps, account, timestamp);
  }

  // supply

  getTotalSupply(): bigint {
    return this.supply.totalSupply;
  }

  setTotalSupply(value: bigint): void {
    this.setField("totalSupply", value);
  }

  getAvgStableRate(): bigint {
    return this.supply.avgStableRate;
  }

  setAvgStableRate(value: bigint): void {
    this.setField("avgStableRate", value);
  }

  getTotalSupplyTimestamp(): bigint {
    return this.supply.totalSupplyTimestamp;
  }

  setTotalSupplyTimestamp(value: bigint): void {
    this.setField("totalSupplyTimestamp", value);
  }

  getCrossChainSupply(): bigint {
    return this.supply.crossChainSupply;
  }

  setCrossChainSupply(value: bigint): void {
    this.setField("crossChainSupply", value);
  }

  // delegation

  getBorrowAllowance(delegator: string, delegatee: string): bigint {
    return this.borrowAllowances.get(delegator)?.get(delegatee) ?? BigInt(0);
  }

  setBorrowAllowance(delegator: string, delegatee: string, amount: bigint): void {
    let allowances = this.borrowAllowances.get(delegator);
    if (allowances === undefined) {
      allowances = new Map<string, bigint>();
      this.borrowAllowances.set(delegator, allowances);
    }
    this.setEntry(allowances, delegatee, amount);
  }

  getNonce(owner: string): bigint {
    return this.nonces.get(owner) ?? BigInt(0);
  }

  setNonce(owner: string, nonce: bigint): void {
    this.setEntry(this.nonces, owner, nonce);
  }
}
