import { MathOverflow } from "../Errors";
import { RAY, checkUint256, rayMul } from "./WadRayMath";

const SECONDS_PER_YEAR = BigInt(365 * 24 * 60 * 60);

function elapsed(lastUpdateTimestamp: bigint, currentTimestamp: bigint): bigint {
  if (currentTimestamp < lastUpdateTimestamp) throw new MathOverflow("elapsed");
  return currentTimestamp - lastUpdateTimestamp;
}

/**
 * Calculates the interest accumulated with a linear interest rate
 * @param rate (27dp)
 * @param lastUpdateTimestamp (0dp)
 * @param currentTimestamp (0dp)
 * @return interestFactor (27dp)
 */
function calculateLinearInterest(rate: bigint, lastUpdateTimestamp: bigint, currentTimestamp: bigint): bigint {
  const dt = elapsed(lastUpdateTimestamp, currentTimestamp);
  return RAY + checkUint256(rate * dt, "calculateLinearInterest") / SECONDS_PER_YEAR;
}

/**
 * Calculates the interest accumulated with a per-second compounded rate using
 * the first three terms of the binomial expansion of (1 + rate/year)^dt. The
 * approximation slightly undercharges, in favour of the borrower.
 * @param rate (27dp)
 * @param lastUpdateTimestamp (0dp)
 * @param currentTimestamp (0dp)
 * @return interestFactor (27dp)
 */
function calculateCompoundedInterest(rate: bigint, lastUpdateTimestamp: bigint, currentTimestamp: bigint): bigint {
  const exp = elapsed(lastUpdateTimestamp, currentTimestamp);
  if (exp === BigInt(0)) return RAY;

  const expMinusOne = exp - BigInt(1);
  const expMinusTwo = exp > BigInt(2) ? exp - BigInt(2) : BigInt(0);

  const basePowerTwo = rayMul(rate, rate) / (SECONDS_PER_YEAR * SECONDS_PER_YEAR);
  const basePowerThree = rayMul(basePowerTwo, rate) / SECONDS_PER_YEAR;

  const secondTerm = checkUint256(exp * expMinusOne * basePowerTwo, "calculateCompoundedInterest") / BigInt(2);
  const thirdTerm =
    checkUint256(exp * expMinusOne * expMinusTwo * basePowerThree, "calculateCompoundedInterest") / BigInt(6);

  return checkUint256(
    RAY + (rate * exp) / SECONDS_PER_YEAR + secondTerm + thirdTerm,
    "calculateCompoundedInterest"
  );
}

export { SECONDS_PER_YEAR, calculateLinearInterest, calculateCompoundedInterest };
