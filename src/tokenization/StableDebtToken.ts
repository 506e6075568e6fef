import type { StableDebtTokenOptions } from "../config/schemas";
import { InitializeParamsSchema, parseOrThrow } from "../config/schemas";
import type { InitializeParams } from "../config/schemas";
import { CrossChainBalanceMode } from "../interfaces/IStableDebtToken";
import type {
  BurnResult,
  IStableDebtToken,
  MintResult,
  SupplyData,
  TotalSupplyAndAvgRate,
} from "../interfaces/IStableDebtToken";
import {
  AlreadyInitialized,
  BurnAmountExceedsBalance,
  InvalidBurnAmount,
  InvalidCrossChainAmount,
  InvalidCrossChainMode,
  InvalidMintAmount,
  PoolAddressesDoNotMatch,
} from "../libraries/Errors";
import { calculateCompoundedInterest } from "../libraries/math/MathUtils";
import { toUint128, toUint40 } from "../libraries/math/SafeCast";
import { rayDiv, rayMul, wadToRay } from "../libraries/math/WadRayMath";
import { normaliseAddress, ZERO_ADDRESS } from "../utils/bytes";
import { DebtTokenBase, DebtTokenContext } from "./base/DebtTokenBase";

export const DEBT_TOKEN_REVISION = BigInt(1);

interface BalanceIncrease {
  previousPrincipalBalance: bigint;
  currentBalance: bigint;
  balanceIncrease: bigint;
}

/**
 * Ledger of stable-rate debt. Each borrower's principal compounds per second
 * at the rate fixed when it was minted (re-averaged on every further mint);
 * the supply compounds at the principal-weighted average of those rates.
 *
 * Because each position and the supply accrue separately the supply can drift
 * slightly from the sum of balances, so the last repayments are clamped at zero.
 */
export class StableDebtToken extends DebtTokenBase implements IStableDebtToken {
  static deploy(options: StableDebtTokenOptions): StableDebtToken {
    return new StableDebtToken(DebtTokenContext.create(options), ZERO_ADDRESS);
  }

  /**
   * Returns a handle to the same ledger acting as `account`.
   */
  connect(account: string): StableDebtToken {
    return new StableDebtToken(this.context, normaliseAddress(account));
  }

  initialize(initializingPool: string, params: InitializeParams): void {
    this.transact("initialize", () => {
      if (this.storage.initialized) throw new AlreadyInitialized();
      const pool = normaliseAddress(initializingPool);
      if (pool !== this.POOL()) throw new PoolAddressesDoNotMatch(this.POOL(), pool);

      const { underlyingAsset, incentivesController, debtTokenDecimals, debtTokenName, debtTokenSymbol, ...rest } =
        parseOrThrow(InitializeParamsSchema, params);

      this.storage.configure({
        name: debtTokenName,
        symbol: debtTokenSymbol,
        decimals: debtTokenDecimals,
        underlyingAsset,
        incentivesController,
      });

      this.emit(
        "Initialized",
        underlyingAsset,
        pool,
        this.getIncentivesController(),
        debtTokenDecimals,
        debtTokenName,
        debtTokenSymbol,
        rest.params
      );
      this.logger.debug({ underlyingAsset, symbol: debtTokenSymbol }, "stable debt token initialized");
    });
  }

  getRevision(): bigint {
    return DEBT_TOKEN_REVISION;
  }

  getAverageStableRate(): bigint {
    return this.storage.getAvgStableRate();
  }

  getUserLastUpdated(user: string): bigint {
    return this.storage.getTimestamp(normaliseAddress(user));
  }

  getUserStableRate(user: string): bigint {
    return this.storage.getUserState(normaliseAddress(user)).additionalData;
  }

  /**
   * Principal compounded at the user's stable rate since their last update.
   */
  balanceOf(account: string): bigint {
    const user = normaliseAddress(account);
    const { balance, additionalData: stableRate } = this.storage.getUserState(user);
    if (balance === BigInt(0)) return BigInt(0);

    const cumulatedInterest = calculateCompoundedInterest(stableRate, this.storage.getTimestamp(user), this.now());
    return rayMul(balance, cumulatedInterest);
  }

  mint(user: string, onBehalfOf: string, amount: bigint, rate: bigint): MintResult {
    return this.transact("mint", () => {
      this.onlyPool();
      this.whenInitialized();
      const borrower = normaliseAddress(user);
      const recipient = normaliseAddress(onBehalfOf);
      if (amount <= BigInt(0)) throw new InvalidMintAmount();

      if (borrower !== recipient) this.decreaseBorrowAllowance(recipient, borrower, amount);

      const { currentBalance, balanceIncrease } = this.calculateBalanceIncrease(recipient);
      const previousSupply = this.totalSupply();
      const nextSupply = previousSupply + amount;
      const amountInRay = wadToRay(amount);

      const currentStableRate = this.storage.getUserState(recipient).additionalData;
      const nextStableRate = toUint128(
        rayDiv(
          rayMul(currentStableRate, wadToRay(currentBalance)) + rayMul(amountInRay, rate),
          wadToRay(currentBalance + amount)
        )
      );
      const nextAvgStableRate = toUint128(
        rayDiv(
          rayMul(this.storage.getAvgStableRate(), wadToRay(previousSupply)) + rayMul(rate, amountInRay),
          wadToRay(nextSupply)
        )
      );

      const timestamp = toUint40(this.now());
      this.storage.setTotalSupply(nextSupply);
      this.storage.setAvgStableRate(nextAvgStableRate);
      this.storage.setTotalSupplyTimestamp(timestamp);
      this.storage.setTimestamp(recipient, timestamp);
      this.storage.setUserState(recipient, {
        ...this.storage.getUserState(recipient),
        additionalData: nextStableRate,
      });

      const amountToMint = amount + balanceIncrease;
      this.mintPrincipal(recipient, amountToMint, previousSupply);

      this.emit("Transfer", ZERO_ADDRESS, recipient, amountToMint);
      this.emit(
        "Mint",
        borrower,
        recipient,
        amountToMint,
        currentBalance,
        balanceIncrease,
        nextStableRate,
        nextAvgStableRate,
        nextSupply
      );
      this.logger.debug(
        { user: borrower, onBehalfOf: recipient, amount, rate, nextStableRate, nextAvgStableRate, nextSupply },
        "stable debt minted"
      );

      return [currentBalance === BigInt(0), nextSupply, nextAvgStableRate] as const;
    });
  }

  burn(from: string, amount: bigint): BurnResult {
    return this.transact("burn", () => {
      this.onlyPool();
      this.whenInitialized();
      const account = normaliseAddress(from);
      if (amount <= BigInt(0)) throw new InvalidBurnAmount();

      const { currentBalance, balanceIncrease } = this.calculateBalanceIncrease(account);
      if (amount > currentBalance) throw new BurnAmountExceedsBalance(account, currentBalance, amount);

      const previousSupply = this.totalSupply();
      const userStableRate = this.storage.getUserState(account).additionalData;
      let nextAvgStableRate = BigInt(0);
      let nextSupply = BigInt(0);

      if (previousSupply > amount) {
        nextSupply = previousSupply - amount;
        const firstTerm = rayMul(this.storage.getAvgStableRate(), wadToRay(previousSupply));
        const secondTerm = rayMul(userStableRate, wadToRay(amount));

        // the last repayment can outweigh the remaining average
        if (secondTerm >= firstTerm) {
          nextSupply = BigInt(0);
        } else {
          nextAvgStableRate = toUint128(rayDiv(firstTerm - secondTerm, wadToRay(nextSupply)));
        }
      }
      this.storage.setTotalSupply(nextSupply);
      this.storage.setAvgStableRate(nextAvgStableRate);

      const timestamp = toUint40(this.now());
      if (amount === currentBalance) {
        this.storage.setUserState(account, { ...this.storage.getUserState(account), additionalData: BigInt(0) });
        this.storage.setTimestamp(account, BigInt(0));
      } else {
        this.storage.setTimestamp(account, timestamp);
      }
      this.storage.setTotalSupplyTimestamp(timestamp);

      if (balanceIncrease > amount) {
        const amountToMint = balanceIncrease - amount;
        this.mintPrincipal(account, amountToMint, previousSupply);
        this.emit("Transfer", ZERO_ADDRESS, account, amountToMint);
        this.emit(
          "Mint",
          account,
          account,
          amountToMint,
          currentBalance,
          balanceIncrease,
          userStableRate,
          nextAvgStableRate,
          nextSupply
        );
      } else {
        const amountToBurn = amount - balanceIncrease;
        this.burnPrincipal(account, amountToBurn, previousSupply);
        this.emit("Transfer", account, ZERO_ADDRESS, amountToBurn);
        this.emit("Burn", account, amountToBurn, currentBalance, balanceIncrease, nextAvgStableRate, nextSupply);
      }
      this.logger.debug({ from: account, amount, nextAvgStableRate, nextSupply }, "stable debt burned");

      return [nextSupply, nextAvgStableRate] as const;
    });
  }

  updateCrossChainBalance(amountScaled: bigint, mode: bigint): void {
    this.transact("updateCrossChainBalance", () => {
      this.onlyPool();
      this.whenInitialized();
      if (mode !== BigInt(CrossChainBalanceMode.Mint) && mode !== BigInt(CrossChainBalanceMode.Burn)) {
        throw new InvalidCrossChainMode(mode);
      }
      if (amountScaled <= BigInt(0)) throw new InvalidCrossChainAmount();

      const previousSupply = this.totalSupply();
      const crossChainSupply = this.storage.getCrossChainSupply();
      let nextSupply: bigint;

      if (mode === BigInt(CrossChainBalanceMode.Mint)) {
        nextSupply = toUint128(previousSupply + amountScaled);
        this.storage.setCrossChainSupply(crossChainSupply + amountScaled);
      } else {
        nextSupply = previousSupply > amountScaled ? previousSupply - amountScaled : BigInt(0);
        this.storage.setCrossChainSupply(crossChainSupply > amountScaled ? crossChainSupply - amountScaled : BigInt(0));
        if (nextSupply === BigInt(0)) this.storage.setAvgStableRate(BigInt(0));
      }
      this.storage.setTotalSupply(nextSupply);
      this.storage.setTotalSupplyTimestamp(toUint40(this.now()));

      this.emit("CrossChainBalanceUpdated", amountScaled, mode, nextSupply);
      this.logger.debug({ amountScaled, mode, nextSupply }, "cross-chain balance updated");
    });
  }

  getSupplyData(): SupplyData {
    const avgRate = this.storage.getAvgStableRate();
    return [
      this.storage.getTotalSupply(),
      this.calcTotalSupply(avgRate),
      avgRate,
      this.storage.getTotalSupplyTimestamp(),
    ] as const;
  }

  getTotalSupplyAndAvgRate(): TotalSupplyAndAvgRate {
    const avgRate = this.storage.getAvgStableRate();
    return [this.calcTotalSupply(avgRate), avgRate] as const;
  }

  /**
   * Principal supply compounded at the average stable rate.
   */
  totalSupply(): bigint {
    return this.calcTotalSupply(this.storage.getAvgStableRate());
  }

  getTotalSupplyLastUpdated(): bigint {
    return this.storage.getTotalSupplyTimestamp();
  }

  principalBalanceOf(user: string): bigint {
    return this.storage.getUserState(normaliseAddress(user)).balance;
  }

  /**
   * Supply mirrored from other chains that is still outstanding.
   */
  getCrossChainSupply(): bigint {
    return this.storage.getCrossChainSupply();
  }

  UNDERLYING_ASSET_ADDRESS(): string {
    return this.storage.underlyingAsset;
  }

  getIncentivesController(): string {
    const { incentivesController } = this.storage;
    return incentivesController === undefined ? ZERO_ADDRESS : normaliseAddress(incentivesController.address);
  }

  private calculateBalanceIncrease(user: string): BalanceIncrease {
    const previousPrincipalBalance = this.storage.getUserState(user).balance;
    if (previousPrincipalBalance === BigInt(0)) {
      return { previousPrincipalBalance, currentBalance: BigInt(0), balanceIncrease: BigInt(0) };
    }

    const currentBalance = this.balanceOf(user);
    return { previousPrincipalBalance, currentBalance, balanceIncrease: currentBalance - previousPrincipalBalance };
  }

  private calcTotalSupply(avgRate: bigint): bigint {
    const principalSupply = this.storage.getTotalSupply();
    if (principalSupply === BigInt(0)) return BigInt(0);

    const cumulatedInterest = calculateCompoundedInterest(avgRate, this.storage.getTotalSupplyTimestamp(), this.now());
    return rayMul(principalSupply, cumulatedInterest);
  }

  private mintPrincipal(account: string, amount: bigint, oldTotalSupply: bigint): void {
    const state = this.storage.getUserState(account);
    const oldAccountBalance = state.balance;
    this.storage.setUserState(account, { ...state, balance: toUint128(oldAccountBalance + amount) });
    this.storage.incentivesController?.handleAction(account, oldTotalSupply, oldAccountBalance);
  }

  private burnPrincipal(account: string, amount: bigint, oldTotalSupply: bigint): void {
    const state = this.storage.getUserState(account);
    const oldAccountBalance = state.balance;
    this.storage.setUserState(account, { ...state, balance: oldAccountBalance - amount });
    this.storage.incentivesController?.handleAction(account, oldTotalSupply, oldAccountBalance);
  }
}
