/**
 * Positional event arguments, in emission order, keyed by event name.
 */
export interface StableDebtTokenEvents {
  Transfer: [from: string, to: string, value: bigint];
  Mint: [
    user: string,
    onBehalfOf: string,
    amount: bigint,
    currentBalance: bigint,
    balanceIncrease: bigint,
    newRate: bigint,
    avgStableRate: bigint,
    newTotalSupply: bigint,
  ];
  Burn: [
    from: string,
    amount: bigint,
    currentBalance: bigint,
    balanceIncrease: bigint,
    avgStableRate: bigint,
    newTotalSupply: bigint,
  ];
  BorrowAllowanceDelegated: [fromUser: string, toUser: string, asset: string, amount: bigint];
  Initialized: [
    underlyingAsset: string,
    pool: string,
    incentivesController: string,
    debtTokenDecimals: number,
    debtTokenName: string,
    debtTokenSymbol: string,
    params: string,
  ];
  CrossChainBalanceUpdated: [amountScaled: bigint, mode: bigint, newTotalSupply: bigint];
}

export type StableDebtTokenEventName = keyof StableDebtTokenEvents;

export type StableDebtTokenListener<E extends StableDebtTokenEventName> = (...args: StableDebtTokenEvents[E]) => void;

export type StableDebtTokenLog = {
  [E in StableDebtTokenEventName]: { name: E; args: StableDebtTokenEvents[E] };
}[StableDebtTokenEventName];
