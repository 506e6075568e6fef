import { expect } from "chai";
import { CrossChainBalanceMode } from "../../src/interfaces/IStableDebtToken";
import {
  CallerMustBePool,
  InvalidCrossChainAmount,
  InvalidCrossChainMode,
} from "../../src/libraries/Errors";
import { WAD } from "../../src/libraries/math/WadRayMath";
import { SECONDS_IN_YEAR } from "../../src/utils/time";
import { expectCustomError } from "../utils/errors";
import { recordEvents } from "../utils/events";
import { STARTING_TIMESTAMP, TEN_PERCENT, deployWithBorrowFixture } from "./utils/fixtures";

describe("StableDebtToken cross-chain balance (unit tests)", () => {
  const MINT_MODE = BigInt(CrossChainBalanceMode.Mint);
  const BURN_MODE = BigInt(CrossChainBalanceMode.Burn);

  const ACCRUED_SUPPLY = BigInt("1105162042821782412576");

  function accruedFixture() {
    const fixture = deployWithBorrowFixture();
    const timestamp = fixture.clock.increase(SECONDS_IN_YEAR);
    return { ...fixture, timestamp };
  }

  it("Should add mint-equivalent amount to accrued supply", () => {
    const { user, timestamp, stableDebtToken, poolToken } = accruedFixture();
    const logs = recordEvents(stableDebtToken);

    const amountScaled = BigInt(500) * WAD;
    poolToken.updateCrossChainBalance(amountScaled, MINT_MODE);

    const nextSupply = ACCRUED_SUPPLY + amountScaled;
    expect(stableDebtToken.getSupplyData()).to.deep.equal([nextSupply, nextSupply, TEN_PERCENT, timestamp]);
    expect(stableDebtToken.getCrossChainSupply()).to.equal(amountScaled);
    expect(logs).to.deep.equal([{ name: "CrossChainBalanceUpdated", args: [amountScaled, MINT_MODE, nextSupply] }]);

    // user positions are untouched
    expect(stableDebtToken.principalBalanceOf(user)).to.equal(BigInt(1000) * WAD);
    expect(stableDebtToken.balanceOf(user)).to.equal(ACCRUED_SUPPLY);
    expect(stableDebtToken.getUserLastUpdated(user)).to.equal(STARTING_TIMESTAMP);
  });

  it("Should subtract burn-equivalent amount from accrued supply", () => {
    const { stableDebtToken, poolToken } = accruedFixture();
    poolToken.updateCrossChainBalance(BigInt(500) * WAD, MINT_MODE);

    const logs = recordEvents(stableDebtToken);
    poolToken.updateCrossChainBalance(BigInt(200) * WAD, BURN_MODE);

    const nextSupply = ACCRUED_SUPPLY + BigInt(300) * WAD;
    expect(stableDebtToken.getTotalSupplyAndAvgRate()).to.deep.equal([nextSupply, TEN_PERCENT]);
    expect(stableDebtToken.getCrossChainSupply()).to.equal(BigInt(300) * WAD);
    expect(logs).to.deep.equal([
      { name: "CrossChainBalanceUpdated", args: [BigInt(200) * WAD, BURN_MODE, nextSupply] },
    ]);
  });

  it("Should clamp supply and reset average rate when burn-equivalent exceeds supply", () => {
    const { timestamp, stableDebtToken, poolToken } = accruedFixture();
    poolToken.updateCrossChainBalance(BigInt(100) * WAD, MINT_MODE);

    poolToken.updateCrossChainBalance(BigInt(2000) * WAD, BURN_MODE);

    expect(stableDebtToken.getSupplyData()).to.deep.equal([BigInt(0), BigInt(0), BigInt(0), timestamp]);
    expect(stableDebtToken.getCrossChainSupply()).to.equal(BigInt(0));
  });

  it("Should fail when mode is unknown", () => {
    const { poolToken, stableDebtToken } = accruedFixture();

    const error = expectCustomError(() => poolToken.updateCrossChainBalance(WAD, BigInt(3)), InvalidCrossChainMode);
    expect(error.args).to.deep.equal([BigInt(3)]);
    expect(stableDebtToken.getTotalSupplyLastUpdated()).to.equal(STARTING_TIMESTAMP);
  });

  it("Should fail when amount is zero", () => {
    const { poolToken } = accruedFixture();

    expectCustomError(() => poolToken.updateCrossChainBalance(BigInt(0), MINT_MODE), InvalidCrossChainAmount);
  });

  it("Should fail when sender is not pool", () => {
    const { user, stableDebtToken } = accruedFixture();

    const error = expectCustomError(
      () => stableDebtToken.connect(user).updateCrossChainBalance(WAD, MINT_MODE),
      CallerMustBePool
    );
    expect(error.args).to.deep.equal([user]);
  });
});
