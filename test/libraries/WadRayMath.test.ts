import { expect } from "chai";
import { DivisionByZero, MathOverflow, SafeCastOverflowedUintDowncast } from "../../src/libraries/Errors";
import { UINT128_MAX, UINT40_MAX, toUint128, toUint40 } from "../../src/libraries/math/SafeCast";
import {
  HALF_RAY,
  RAY,
  UINT256_MAX,
  WAD,
  WAD_RAY_RATIO,
  rayDiv,
  rayMul,
  rayToWad,
  wadDiv,
  wadMul,
  wadToRay,
} from "../../src/libraries/math/WadRayMath";
import { expectCustomError } from "../utils/errors";

describe("WadRayMath", () => {
  describe("Wad", () => {
    it("Should multiply wads", () => {
      expect(wadMul(BigInt(2.5e18), BigInt(2) * WAD)).to.equal(BigInt(5) * WAD);
    });

    it("Should divide wads rounding half up", () => {
      expect(wadDiv(WAD, BigInt(3) * WAD)).to.equal(BigInt("333333333333333333"));
      expect(wadDiv(BigInt(2) * WAD, BigInt(3) * WAD)).to.equal(BigInt("666666666666666667"));
    });

    it("Should fail to divide by zero", () => {
      expectCustomError(() => wadDiv(WAD, BigInt(0)), DivisionByZero);
    });
  });

  describe("Ray", () => {
    it("Should multiply rays rounding half up", () => {
      expect(rayMul(BigInt(1), HALF_RAY)).to.equal(BigInt(1));
      expect(rayMul(BigInt(1), HALF_RAY - BigInt(1))).to.equal(BigInt(0));
      expect(rayMul(BigInt(3) * RAY, RAY / BigInt(2))).to.equal((BigInt(3) * RAY) / BigInt(2));
    });

    it("Should divide rays rounding half up", () => {
      expect(rayDiv(BigInt(1), BigInt(2) * RAY)).to.equal(BigInt(1));
      expect(rayDiv(BigInt(1), BigInt(2) * RAY + BigInt(2))).to.equal(BigInt(0));
      expect(rayDiv(RAY, BigInt(4) * RAY)).to.equal(RAY / BigInt(4));
    });

    it("Should fail to divide by zero", () => {
      expectCustomError(() => rayDiv(RAY, BigInt(0)), DivisionByZero);
    });

    it("Should fail when product overflows uint256", () => {
      const error = expectCustomError(() => rayMul(UINT256_MAX, BigInt(2)), MathOverflow);
      expect(error.args).to.deep.equal(["rayMul"]);
    });

    it("Should fail on negative operands", () => {
      expectCustomError(() => rayMul(BigInt(-1), RAY), MathOverflow);
    });
  });

  describe("Conversion", () => {
    it("Should convert wad to ray", () => {
      expect(wadToRay(WAD)).to.equal(RAY);
      expect(wadToRay(BigInt(1))).to.equal(WAD_RAY_RATIO);
    });

    it("Should convert ray to wad rounding half up", () => {
      expect(rayToWad(RAY)).to.equal(WAD);
      expect(rayToWad(WAD_RAY_RATIO / BigInt(2))).to.equal(BigInt(1));
      expect(rayToWad(WAD_RAY_RATIO / BigInt(2) - BigInt(1))).to.equal(BigInt(0));
    });
  });
});

describe("SafeCast", () => {
  it("Should pass values within range", () => {
    expect(toUint128(UINT128_MAX)).to.equal(UINT128_MAX);
    expect(toUint40(UINT40_MAX)).to.equal(UINT40_MAX);
  });

  it("Should fail when value exceeds uint128", () => {
    const error = expectCustomError(() => toUint128(UINT128_MAX + BigInt(1)), SafeCastOverflowedUintDowncast);
    expect(error.args).to.deep.equal([128, UINT128_MAX + BigInt(1)]);
  });

  it("Should fail when value is negative", () => {
    const error = expectCustomError(() => toUint40(BigInt(-1)), SafeCastOverflowedUintDowncast);
    expect(error.args).to.deep.equal([40, BigInt(-1)]);
  });
});
