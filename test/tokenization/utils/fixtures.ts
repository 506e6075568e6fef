import { RAY, WAD } from "../../../src/libraries/math/WadRayMath";
import { createNoopLogger } from "../../../src/observability/logger";
import { StableDebtToken } from "../../../src/tokenization/StableDebtToken";
import { ManualClock } from "../../../src/utils/time";
import { getRandomAddress } from "../../utils/bytes";

export const STARTING_TIMESTAMP = BigInt(1897776000);
export const TEN_PERCENT = RAY / BigInt(10);

/**
 * Deploys and initialises a token on chain 1 and borrows 1000 at 10% for `user`.
 */
export function deployWithBorrowFixture() {
  const pool = getRandomAddress();
  const user = getRandomAddress();
  const underlyingAsset = getRandomAddress();
  const clock = new ManualClock(STARTING_TIMESTAMP);
  const chainId = BigInt(1);

  const stableDebtToken = StableDebtToken.deploy({
    address: getRandomAddress(),
    pool,
    chainId,
    clock,
    logger: createNoopLogger(),
  });
  stableDebtToken.initialize(pool, {
    underlyingAsset,
    debtTokenDecimals: 18,
    debtTokenName: "Stable Debt USDC",
    debtTokenSymbol: "stableDebtUSDC",
  });

  const poolToken = stableDebtToken.connect(pool);
  const amount = BigInt(1000) * WAD;
  poolToken.mint(user, user, amount, TEN_PERCENT);

  return { pool, user, underlyingAsset, clock, chainId, stableDebtToken, poolToken, amount };
}
