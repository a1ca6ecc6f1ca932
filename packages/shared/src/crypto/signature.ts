import { Signature, Wallet, getBytes, hashMessage, isHexString, recoverAddress } from "ethers";
import { RedemptionError } from "../errors.js";

export const SIGNATURE_BYTES = 65;

/**
 * EIP-191 personal-message digest of a 32-byte hash:
 * keccak256("\x19Ethereum Signed Message:\n32" ‖ hash).
 */
export function toSignedMessageHash(messageHash: string): string {
  return hashMessage(getBytes(messageHash));
}

export function recoverSigner(messageHash: string, signature: string): string {
  if (!isHexString(messageHash, 32)) {
    throw new RedemptionError("INVALID_SIGNATURE_FORMAT", "message hash must be 32 bytes");
  }
  if (!isHexString(signature, SIGNATURE_BYTES)) {
    throw new RedemptionError(
      "INVALID_SIGNATURE_FORMAT",
      `signature must be ${SIGNATURE_BYTES} hex-encoded bytes (r ‖ s ‖ v)`,
    );
  }

  try {
    return recoverAddress(toSignedMessageHash(messageHash), Signature.from(signature));
  } catch (error) {
    throw new RedemptionError("SIGNATURE_RECOVERY_FAILED", "no signer could be recovered", {
      cause: error,
    });
  }
}

/** Signs a redemption hash the way a delegate's wallet does (`personal_sign`). */
export function signDigest(messageHash: string, privateKeyHex: string): string {
  if (!isHexString(messageHash, 32)) {
    throw new RedemptionError("INVALID_INPUT", "message hash must be 32 bytes");
  }
  return new Wallet(privateKeyHex).signMessageSync(getBytes(messageHash));
}
