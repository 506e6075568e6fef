import { SECONDS_PER_YEAR } from "../../../src/libraries/math/MathUtils";

function mulScale(n1: bigint, n2: bigint, scale: bigint): bigint {
  return (n1 * n2) / scale;
}

function expBySquaring(x: bigint, n: bigint, scale: bigint): bigint {
  if (n === BigInt(0)) return scale;

  let y = scale;
  while (n > BigInt(1)) {
    if (n % BigInt(2)) {
      y = mulScale(x, y, scale);
      n = (n - BigInt(1)) / BigInt(2);
    } else {
      n = n / BigInt(2);
    }
    x = mulScale(x, x, scale);
  }
  return mulScale(x, y, scale);
}

/**
 * Exact per-second compounding of an annual rate over `seconds`
 * @param rate (scale)
 * @param scale
 * @param seconds (0dp)
 * @return interestFactor (scale)
 */
function compoundEverySecond(rate: bigint, scale: bigint, seconds: bigint): bigint {
  return expBySquaring(scale + rate / SECONDS_PER_YEAR, seconds, scale);
}

export { mulScale, expBySquaring, compoundEverySecond };
