export interface ICreditDelegationToken {
  /**
   * Delegates borrowing power to a user on the specific debt token.
   * Delegation will still respect the liquidation constraints.
   */
  approveDelegation(delegatee: string, amount: bigint): void;

  /**
   * Delegates borrowing power through an EIP-712 signature of the delegator.
   */
  delegationWithSig(delegator: string, delegatee: string, value: bigint, deadline: bigint, signature: string): void;

  borrowAllowance(fromUser: string, toUser: string): bigint;
}
