import { ethers } from "ethers";
import { z } from "zod";
import type { Logger } from "pino";
import { InvalidParams } from "../libraries/Errors";
import type { IIncentivesController } from "../interfaces/IIncentivesController";
import type { Clock } from "../utils/time";

export const AddressSchema = z
  .string()
  .refine((value) => ethers.isAddress(value), { message: "not an EVM address" })
  .transform((value) => ethers.getAddress(value));

const NonZeroAddressSchema = AddressSchema.refine((value) => value !== ethers.ZeroAddress, {
  message: "zero address",
});

const HexBytesSchema = z.string().refine((value) => ethers.isHexString(value), { message: "not hex bytes" });

const IncentivesControllerSchema = z.custom<IIncentivesController>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "handleAction" in value &&
    typeof value.handleAction === "function" &&
    "address" in value &&
    typeof value.address === "string" &&
    ethers.isAddress(value.address),
  { message: "expected an incentives controller with an address and handleAction" }
);

export const InitializeParamsSchema = z.object({
  underlyingAsset: NonZeroAddressSchema,
  incentivesController: IncentivesControllerSchema.optional(),
  debtTokenDecimals: z.number().int().min(0).max(255),
  debtTokenName: z.string().min(1),
  debtTokenSymbol: z.string().min(1),
  params: HexBytesSchema.default("0x"),
});

export type InitializeParams = z.input<typeof InitializeParamsSchema>;

export const StableDebtTokenOptionsSchema = z.object({
  address: NonZeroAddressSchema,
  pool: NonZeroAddressSchema,
  chainId: z.bigint().positive(),
  clock: z.custom<Clock>(
    (value) => typeof value === "object" && value !== null && "now" in value && typeof value.now === "function"
  ),
  logger: z.custom<Logger>().optional(),
});

export type StableDebtTokenOptions = z.input<typeof StableDebtTokenOptionsSchema>;

/**
 * Parses with the given schema, converting validation issues into an
 * InvalidParams ledger error.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidParams(result.error.issues.map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`));
  }
  return result.data;
}
