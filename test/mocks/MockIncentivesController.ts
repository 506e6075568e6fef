import type { IIncentivesController } from "../../src/interfaces/IIncentivesController";

export class MockIncentivesController implements IIncentivesController {
  readonly actions: [user: string, totalSupply: bigint, userBalance: bigint][] = [];
  shouldRevert = false;

  constructor(readonly address: string) {}

  handleAction(user: string, totalSupply: bigint, userBalance: bigint): void {
    if (this.shouldRevert) throw Error("MockIncentivesController: reverted");
    this.actions.push([user, totalSupply, userBalance]);
  }
}
