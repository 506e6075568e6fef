import { SafeCastOverflowedUintDowncast } from "../Errors";

const UINT40_MAX = (BigInt(1) << BigInt(40)) - BigInt(1);
const UINT128_MAX = (BigInt(1) << BigInt(128)) - BigInt(1);

function toUint(value: bigint, bits: number, max: bigint): bigint {
  if (value < BigInt(0) || value > max) throw new SafeCastOverflowedUintDowncast(bits, value);
  return value;
}

function toUint40(value: bigint): bigint {
  return toUint(value, 40, UINT40_MAX);
}

function toUint128(value: bigint): bigint {
  return toUint(value, 128, UINT128_MAX);
}

export { UINT40_MAX, UINT128_MAX, toUint40, toUint128 };
