import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Wallet } from "ethers";
import {
  computeCondensedIDsHash,
  computeCondensedRedemptionHash,
  computeRedemptionHash,
  signDigest,
} from "@certclaim/shared";
import type { CreditLedger, CreditLedgerStatus, CreditResult } from "../ledger/credit-ledger.js";

export const SERVICE_IDENTITY = "0x1000000000000000000000000000000000000001";
export const OTHER_SERVICE_IDENTITY = "0x2000000000000000000000000000000000000002";

export const DELEGATE_KEY = `0x${"11".repeat(32)}`;
export const CONDENSER_KEY = `0x${"22".repeat(32)}`;
export const OUTSIDER_KEY = `0x${"33".repeat(32)}`;

export const DELEGATE = new Wallet(DELEGATE_KEY).address;
export const CONDENSER = new Wallet(CONDENSER_KEY).address;
export const HOLDER = new Wallet(`0x${"44".repeat(32)}`).address;
export const OTHER_HOLDER = new Wallet(`0x${"55".repeat(32)}`).address;

export const ADMIN = { role: "issuer_admin", actor: "issuer-ops-1" };

export function createTempDbPath(prefix = "certclaim-redemption-") {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return {
    dir,
    dbPath: join(dir, "redemption.db"),
  };
}

export function signRedemption(
  privateKey: string,
  certificateID: string,
  holder: string,
  serviceIdentity = SERVICE_IDENTITY,
): string {
  return signDigest(computeRedemptionHash(serviceIdentity, certificateID, holder), privateKey);
}

export function signCondensedRedemption(
  privateKey: string,
  certificateIDs: string[],
  combinedAmount: bigint,
  holder: string,
  serviceIdentity = SERVICE_IDENTITY,
): string {
  const idsHash = computeCondensedIDsHash(certificateIDs);
  return signDigest(
    computeCondensedRedemptionHash(serviceIdentity, idsHash, combinedAmount, holder),
    privateKey,
  );
}

/** In-process asset ledger; records every credit. */
export class FakeCreditLedger implements CreditLedger {
  readonly credits: Array<{ holder: string; amount: bigint }> = [];
  failNext: Error | null = null;
  onCredit?: (holder: string, amount: bigint) => Promise<void>;

  async credit(holder: string, amount: bigint): Promise<CreditResult> {
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
    if (this.onCredit) {
      await this.onCredit(holder, amount);
    }
    this.credits.push({ holder, amount });
    return { creditRef: `fake-credit-${this.credits.length}` };
  }

  balanceOf(holder: string): bigint {
    return this.credits
      .filter((credit) => credit.holder === holder)
      .reduce((sum, credit) => sum + credit.amount, 0n);
  }

  async status(): Promise<CreditLedgerStatus> {
    return { kind: "memory" };
  }
}
