import { DivisionByZero, MathOverflow } from "../Errors";

const WAD = BigInt(10) ** BigInt(18);
const HALF_WAD = WAD / BigInt(2);

const RAY = BigInt(10) ** BigInt(27);
const HALF_RAY = RAY / BigInt(2);

const WAD_RAY_RATIO = BigInt(10) ** BigInt(9);
const HALF_WAD_RAY_RATIO = WAD_RAY_RATIO / BigInt(2);

const UINT256_MAX = (BigInt(1) << BigInt(256)) - BigInt(1);

/**
 * Asserts value fits in a uint256, the width every stored quantity is
 * computed in.
 */
function checkUint256(value: bigint, operation: string): bigint {
  if (value < BigInt(0) || value > UINT256_MAX) throw new MathOverflow(operation);
  return value;
}

/**
 * Multiplies two wads, rounding half up
 * @param a (18dp)
 * @param b (18dp)
 * @return a*b (18dp)
 */
function wadMul(a: bigint, b: bigint): bigint {
  return checkUint256((checkUint256(a * b, "wadMul") + HALF_WAD) / WAD, "wadMul");
}

/**
 * Divides two wads, rounding half up
 * @param a (18dp)
 * @param b (18dp)
 * @return a/b (18dp)
 */
function wadDiv(a: bigint, b: bigint): bigint {
  if (b === BigInt(0)) throw new DivisionByZero();
  return checkUint256((checkUint256(a * WAD, "wadDiv") + b / BigInt(2)) / b, "wadDiv");
}

/**
 * Multiplies two rays, rounding half up
 * @param a (27dp)
 * @param b (27dp)
 * @return a*b (27dp)
 */
function rayMul(a: bigint, b: bigint): bigint {
  return checkUint256((checkUint256(a * b, "rayMul") + HALF_RAY) / RAY, "rayMul");
}

/**
 * Divides two rays, rounding half up
 * @param a (27dp)
 * @param b (27dp)
 * @return a/b (27dp)
 */
function rayDiv(a: bigint, b: bigint): bigint {
  if (b === BigInt(0)) throw new DivisionByZero();
  return checkUint256((checkUint256(a * RAY, "rayDiv") + b / BigInt(2)) / b, "rayDiv");
}

/**
 * Casts ray down to wad, rounding half up
 * @param a (27dp)
 * @return a (18dp)
 */
function rayToWad(a: bigint): bigint {
  checkUint256(a, "rayToWad");
  const result = a / WAD_RAY_RATIO;
  return a % WAD_RAY_RATIO >= HALF_WAD_RAY_RATIO ? result + BigInt(1) : result;
}

/**
 * Converts wad up to ray
 * @param a (18dp)
 * @return a (27dp)
 */
function wadToRay(a: bigint): bigint {
  return checkUint256(a * WAD_RAY_RATIO, "wadToRay");
}

export {
  WAD,
  HALF_WAD,
  RAY,
  HALF_RAY,
  WAD_RAY_RATIO,
  UINT256_MAX,
  checkUint256,
  wadMul,
  wadDiv,
  rayMul,
  rayDiv,
  rayToWad,
  wadToRay,
};
