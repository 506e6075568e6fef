export { StableDebtToken, DEBT_TOKEN_REVISION } from "./tokenization/StableDebtToken";
export { DebtTokenBase, DebtTokenContext, DELEGATION_WITH_SIG_TYPES, EIP712_REVISION } from "./tokenization/base/DebtTokenBase";
export { DebtTokenStorage } from "./tokenization/base/DebtTokenStorage";
export type { UserState } from "./tokenization/base/DebtTokenStorage";

export { CrossChainBalanceMode } from "./interfaces/IStableDebtToken";
export type {
  BurnResult,
  IInitializableDebtToken,
  IStableDebtToken,
  MintResult,
  SupplyData,
  TotalSupplyAndAvgRate,
} from "./interfaces/IStableDebtToken";
export type { ICreditDelegationToken } from "./interfaces/ICreditDelegationToken";
export type { IIncentivesController } from "./interfaces/IIncentivesController";
export type {
  StableDebtTokenEventName,
  StableDebtTokenEvents,
  StableDebtTokenListener,
  StableDebtTokenLog,
} from "./interfaces/events";

export * from "./libraries/Errors";
export * from "./libraries/math/WadRayMath";
export * from "./libraries/math/MathUtils";
export * from "./libraries/math/SafeCast";

export { InitializeParamsSchema, StableDebtTokenOptionsSchema, AddressSchema } from "./config/schemas";
export type { InitializeParams, StableDebtTokenOptions } from "./config/schemas";
export { loadEnv } from "./config/env";
export type { Env } from "./config/env";
export { createLogger, createNoopLogger } from "./observability/logger";
export type { Logger } from "./observability/logger";
export {
  ManualClock,
  SECONDS_IN_DAY,
  SECONDS_IN_HOUR,
  SECONDS_IN_MINUTE,
  SECONDS_IN_WEEK,
  SECONDS_IN_YEAR,
  SystemClock,
  unixTime,
} from "./utils/time";
export type { Clock } from "./utils/time";
export { ZERO_ADDRESS, normaliseAddress } from "./utils/bytes";
