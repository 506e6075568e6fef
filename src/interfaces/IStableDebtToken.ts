import type { InitializeParams } from "../config/schemas";
import type { ICreditDelegationToken } from "./ICreditDelegationToken";

/** Mode of `updateCrossChainBalance`. */
export enum CrossChainBalanceMode {
  Mint = 1,
  Burn = 2,
}

/** [isFirstBorrow, totalStableDebt, avgStableRate] */
export type MintResult = readonly [boolean, bigint, bigint];

/** [totalStableDebt, avgStableRate] */
export type BurnResult = readonly [bigint, bigint];

/** [principalSupply, totalSupply, avgStableRate, totalSupplyTimestamp] */
export type SupplyData = readonly [bigint, bigint, bigint, bigint];

/** [totalSupply, avgStableRate] */
export type TotalSupplyAndAvgRate = readonly [bigint, bigint];

export interface IInitializableDebtToken {
  initialize(pool: string, params: InitializeParams): void;
}

/**
 * Debt token tracking stable-rate borrows. Each position accrues at the rate
 * fixed when it was minted; the supply accrues at the average of those rates.
 */
export interface IStableDebtToken extends IInitializableDebtToken, ICreditDelegationToken {
  /**
   * Mints debt to `onBehalfOf`. When `user` differs, `user` must hold enough
   * borrow allowance from `onBehalfOf`.
   * @param rate stable rate of the new debt (27dp)
   */
  mint(user: string, onBehalfOf: string, amount: bigint, rate: bigint): MintResult;

  /**
   * Burns debt of `from`, accruing interest first.
   */
  burn(from: string, amount: bigint): BurnResult;

  /**
   * Mirrors a mint (mode 1) or burn (mode 2) of debt accounted on another
   * chain into the supply of this token.
   */
  updateCrossChainBalance(amountScaled: bigint, mode: bigint): void;

  getAverageStableRate(): bigint;
  getUserStableRate(user: string): bigint;
  getUserLastUpdated(user: string): bigint;
  getSupplyData(): SupplyData;
  getTotalSupplyLastUpdated(): bigint;
  getTotalSupplyAndAvgRate(): TotalSupplyAndAvgRate;
  principalBalanceOf(user: string): bigint;
  UNDERLYING_ASSET_ADDRESS(): string;
  getIncentivesController(): string;
}
