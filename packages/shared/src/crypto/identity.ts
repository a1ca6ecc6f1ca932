import { getAddress, isAddress, isHexString, solidityPackedKeccak256 } from "ethers";
import { RedemptionError } from "../errors.js";

/**
 * Identity hashing for certificate types and redemption approvals.
 *
 * Every derivation is keccak256 over Solidity packed encoding, so a delegate
 * signing with any EVM toolchain derives the same bytes:
 *
 *   certificateID           = keccak256(uint256 amount ‖ address service ‖ address[] delegates ‖ string metadata)
 *   redemptionHash          = keccak256(bytes32 certificateID ‖ address service ‖ address holder)
 *   condensedIDsHash        = keccak256(bytes32[] certificateIDs)
 *   condensedRedemptionHash = keccak256(bytes32 condensedIDsHash ‖ uint256 combinedAmount ‖ address holder ‖ address service)
 *
 * Array elements are left-padded to 32 bytes; metadata is raw UTF-8.
 */

const UINT256_MAX = (1n << 256n) - 1n;

export function normalizeAddress(value: string, field = "address"): string {
  if (!isAddress(value)) {
    throw new RedemptionError("INVALID_INPUT", `${field} must be a 20-byte hex address`);
  }
  return getAddress(value);
}

export function normalizeCertificateID(value: string, field = "certificateID"): string {
  if (!isHexString(value, 32)) {
    throw new RedemptionError("INVALID_INPUT", `${field} must be a 32-byte hex string`);
  }
  return value.toLowerCase();
}

export function normalizeAmount(value: bigint, field = "amount"): bigint {
  if (value < 0n || value > UINT256_MAX) {
    throw new RedemptionError("INVALID_INPUT", `${field} must fit in an unsigned 256-bit integer`);
  }
  return value;
}

export function computeCertificateID(
  serviceIdentity: string,
  amount: bigint,
  delegates: readonly string[],
  metadata: string,
): string {
  return solidityPackedKeccak256(
    ["uint256", "address", "address[]", "string"],
    [
      normalizeAmount(amount),
      normalizeAddress(serviceIdentity, "serviceIdentity"),
      delegates.map((delegate) => normalizeAddress(delegate, "delegate")),
      metadata,
    ],
  );
}

export function computeRedemptionHash(
  serviceIdentity: string,
  certificateID: string,
  holder: string,
): string {
  return solidityPackedKeccak256(
    ["bytes32", "address", "address"],
    [
      normalizeCertificateID(certificateID),
      normalizeAddress(serviceIdentity, "serviceIdentity"),
      normalizeAddress(holder, "holder"),
    ],
  );
}

export function computeCondensedIDsHash(certificateIDs: readonly string[]): string {
  return solidityPackedKeccak256(
    ["bytes32[]"],
    [certificateIDs.map((certificateID) => normalizeCertificateID(certificateID))],
  );
}

export function computeCondensedRedemptionHash(
  serviceIdentity: string,
  condensedIDsHash: string,
  combinedAmount: bigint,
  holder: string,
): string {
  return solidityPackedKeccak256(
    ["bytes32", "uint256", "address", "address"],
    [
      normalizeCertificateID(condensedIDsHash, "condensedIDsHash"),
      normalizeAmount(combinedAmount, "combinedAmount"),
      normalizeAddress(holder, "holder"),
      normalizeAddress(serviceIdentity, "serviceIdentity"),
    ],
  );
}
