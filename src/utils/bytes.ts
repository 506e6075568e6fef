import { ethers } from "ethers";
import { InvalidAddress } from "../libraries/Errors";

export const ZERO_ADDRESS = ethers.ZeroAddress;

/**
 * Returns the checksummed form of an EVM address, throwing InvalidAddress
 * for anything that isn't one.
 */
export function normaliseAddress(address: string): string {
  if (!ethers.isAddress(address)) throw new InvalidAddress(address);
  return ethers.getAddress(address);
}
