/**
 * Rewards distributor notified whenever a debt balance changes.
 */
export interface IIncentivesController {
  readonly address: string;

  /**
   * Called with the values as they were before the change.
   * @param user the account whose balance changed
   * @param totalSupply total supply before the change
   * @param userBalance principal balance of the account before the change
   */
  handleAction(user: string, totalSupply: bigint, userBalance: bigint): void;
}
