import {
  type AdminCaller,
  type AdminRoleSet,
  type CertificateType,
  type CondensedAmountPolicy,
  type CondensedRedemptionReceipt,
  computeCertificateID,
  computeCondensedIDsHash,
  computeCondensedRedemptionHash,
  computeRedemptionHash,
  normalizeAddress,
  normalizeAmount,
  normalizeCertificateID,
  type RedemptionEvent,
  RedemptionError,
  type RedemptionReceipt,
  recoverSigner,
  requireAdmin,
  type StoredRedemptionEvent,
} from "@certclaim/shared";
import { type CreditLedger, CreditNotAppliedError } from "../ledger/credit-ledger.js";
import type { RedemptionStore } from "../storage/redemption-store.js";

export interface RedemptionEngineOptions {
  store: RedemptionStore;
  creditLedger: CreditLedger;
  /** Address every redemption hash is bound to; signatures for another deployment fail. */
  serviceIdentity: string;
  adminRoles: AdminRoleSet;
  condensedAmountPolicy?: CondensedAmountPolicy;
  now?: () => Date;
}

export interface CreateCertificateTypeResult {
  certificateID: string;
  created: boolean;
  certificateType: CertificateType;
  event: StoredRedemptionEvent;
}

export interface CondenserDelegateResult {
  address: string;
  changed: boolean;
  event?: StoredRedemptionEvent;
}

export interface Redemption<R> {
  receipt: R;
  event: StoredRedemptionEvent;
}

export class RedemptionEngine {
  readonly serviceIdentity: string;
  readonly condensedAmountPolicy: CondensedAmountPolicy;
  private readonly store: RedemptionStore;
  private readonly creditLedger: CreditLedger;
  private readonly adminRoles: AdminRoleSet;
  private readonly now: () => Date;

  constructor(options: RedemptionEngineOptions) {
    this.serviceIdentity = normalizeAddress(options.serviceIdentity, "serviceIdentity");
    this.condensedAmountPolicy = options.condensedAmountPolicy ?? "recompute";
    this.store = options.store;
    this.creditLedger = options.creditLedger;
    this.adminRoles = options.adminRoles;
    this.now = options.now ?? (() => new Date());
  }

  // Registry

  createCertificateType(
    caller: AdminCaller,
    amount: bigint,
    delegates: readonly string[],
    metadata: string,
  ): CreateCertificateTypeResult {
    requireAdmin(caller, this.adminRoles);
    const normalizedDelegates = delegates.map((delegate) => normalizeAddress(delegate, "delegate"));
    const certificateID = computeCertificateID(
      this.serviceIdentity,
      amount,
      normalizedDelegates,
      metadata,
    );
    const occurredAt = this.now().toISOString();

    return this.store.atomically(() => {
      const created = this.store.insertCertificateType({
        certificateID,
        amount: amount.toString(),
        metadata,
        createdAt: occurredAt,
      });
      for (const delegate of normalizedDelegates) {
        this.store.addDelegate(certificateID, delegate);
      }
      const event = this.store.appendEvent({
        type: "CERTIFICATE_TYPE_CREATED",
        occurredAt,
        certificateID,
        amount: amount.toString(),
        delegates: normalizedDelegates,
        ...(caller.actor ? { actor: caller.actor } : {}),
      });
      const certificateType = this.store.getCertificateType(certificateID);
      if (!certificateType) {
        throw new Error(`certificate type ${certificateID} missing after insert`);
      }
      return { certificateID, created, certificateType, event };
    });
  }

  getCertificateType(certificateID: string): CertificateType | null {
    return this.store.getCertificateType(normalizeCertificateID(certificateID));
  }

  listCertificateTypes(): CertificateType[] {
    return this.store.listCertificateTypes();
  }

  /** 0n for unknown IDs; use getCertificateType to tell "absent" from "zero". */
  getCertificateAmount(certificateID: string): bigint {
    const certificateType = this.getCertificateType(certificateID);
    return certificateType ? BigInt(certificateType.amount) : 0n;
  }

  getCertificateMetadata(certificateID: string): string {
    return this.getCertificateType(certificateID)?.metadata ?? "";
  }

  isDelegate(certificateID: string, address: string): boolean {
    return this.store.isDelegate(
      normalizeCertificateID(certificateID),
      normalizeAddress(address, "delegate"),
    );
  }

  isClaimed(certificateID: string, holder: string): boolean {
    return this.store.isClaimed(
      normalizeCertificateID(certificateID),
      normalizeAddress(holder, "holder"),
    );
  }

  // Condenser delegates

  addCondenserDelegate(caller: AdminCaller, address: string): CondenserDelegateResult {
    return this.setCondenserDelegate(caller, address, true);
  }

  removeCondenserDelegate(caller: AdminCaller, address: string): CondenserDelegateResult {
    return this.setCondenserDelegate(caller, address, false);
  }

  isCondenserDelegate(address: string): boolean {
    return this.store.isCondenserDelegate(normalizeAddress(address, "condenser"));
  }

  listCondenserDelegates(): string[] {
    return this.store.listCondenserDelegates();
  }

  // Redemption

  async redeem(
    caller: string,
    signature: string,
    certificateID: string,
  ): Promise<Redemption<RedemptionReceipt>> {
    const holder = normalizeAddress(caller, "caller");
    const id = normalizeCertificateID(certificateID);

    const signer = recoverSigner(computeRedemptionHash(this.serviceIdentity, id, holder), signature);
    if (!this.store.isDelegate(id, signer)) {
      throw new RedemptionError("UNAUTHORIZED", `${signer} is not a delegate of ${id}`);
    }

    const redeemedAt = this.claim(holder, [id]);
    const amount = this.getCertificateAmount(id);
    const { creditRef } = await this.creditOrRelease(holder, [id], amount);

    const event = this.store.appendEvent({
      type: "REDEEMED",
      occurredAt: redeemedAt,
      holder,
      amount: amount.toString(),
      certificateID: id,
    });
    const receipt: RedemptionReceipt = {
      certificateID: id,
      holder,
      signer,
      amount: amount.toString(),
      redeemedAt,
      ...(creditRef ? { creditRef } : {}),
    };
    return { receipt, event };
  }

  async redeemCondensed(
    caller: string,
    signature: string,
    combinedAmount: bigint,
    certificateIDs: readonly string[],
  ): Promise<Redemption<CondensedRedemptionReceipt>> {
    const holder = normalizeAddress(caller, "caller");
    normalizeAmount(combinedAmount, "combinedAmount");
    if (certificateIDs.length === 0) {
      throw new RedemptionError("INVALID_INPUT", "certificateIDs must not be empty");
    }
    const ids = certificateIDs.map((certificateID) => normalizeCertificateID(certificateID));
    if (new Set(ids).size !== ids.length) {
      throw new RedemptionError("INVALID_INPUT", "certificateIDs must not repeat");
    }

    const condensedIDsHash = computeCondensedIDsHash(ids);
    const signer = recoverSigner(
      computeCondensedRedemptionHash(this.serviceIdentity, condensedIDsHash, combinedAmount, holder),
      signature,
    );
    if (!this.store.isCondenserDelegate(signer)) {
      throw new RedemptionError("UNAUTHORIZED", `${signer} is not a condenser delegate`);
    }

    if (this.condensedAmountPolicy === "recompute") {
      const registeredTotal = ids.reduce((sum, id) => sum + this.getCertificateAmount(id), 0n);
      if (registeredTotal !== combinedAmount) {
        throw new RedemptionError(
          "AMOUNT_MISMATCH",
          `combinedAmount ${combinedAmount} does not equal registered total ${registeredTotal}`,
        );
      }
    }

    const redeemedAt = this.claim(holder, ids);
    const { creditRef } = await this.creditOrRelease(holder, ids, combinedAmount);

    const event = this.store.appendEvent({
      type: "CONDENSED_REDEEMED",
      occurredAt: redeemedAt,
      holder,
      amount: combinedAmount.toString(),
      certificateIDs: ids,
    });
    const receipt: CondensedRedemptionReceipt = {
      certificateIDs: ids,
      holder,
      signer,
      amount: combinedAmount.toString(),
      redeemedAt,
      ...(creditRef ? { creditRef } : {}),
    };
    return { receipt, event };
  }

  listEvents(filter: { certificateID?: string; holder?: string } = {}): StoredRedemptionEvent[] {
    return this.store.listEvents({
      certificateID: filter.certificateID
        ? normalizeCertificateID(filter.certificateID)
        : undefined,
      holder: filter.holder ? normalizeAddress(filter.holder, "holder") : undefined,
    });
  }

  /**
   * Check-and-set for every (id, holder) pair in one transaction. Nothing
   * awaits between the check and the write, and the flags are durable before
   * the ledger is called.
   */
  private claim(holder: string, ids: readonly string[]): string {
    const claimedAt = this.now().toISOString();
    this.store.atomically(() => {
      const already = ids.find((id) => this.store.isClaimed(id, holder));
      if (already) {
        throw new RedemptionError("ALREADY_CLAIMED", `${already} already claimed by ${holder}`);
      }
      for (const id of ids) {
        this.store.markClaimed(id, holder, claimedAt);
      }
    });
    return claimedAt;
  }

  /**
   * Claims are released only when the ledger reports the credit was not
   * applied. Any other failure keeps them set and records CREDIT_UNCONFIRMED.
   */
  private async creditOrRelease(holder: string, ids: readonly string[], amount: bigint) {
    try {
      return await this.creditLedger.credit(holder, amount);
    } catch (error) {
      const reason = error instanceof Error ? error.message : "credit ledger failed";
      if (error instanceof CreditNotAppliedError) {
        this.releaseClaims(holder, ids);
        throw new RedemptionError("CREDIT_FAILED", reason, { cause: error });
      }
      this.store.appendEvent({
        type: "CREDIT_UNCONFIRMED",
        occurredAt: this.now().toISOString(),
        holder,
        amount: amount.toString(),
        certificateIDs: [...ids],
        reason,
      });
      throw new RedemptionError(
        "CREDIT_UNCONFIRMED",
        `credit outcome unknown, claims kept: ${reason}`,
        { cause: error },
      );
    }
  }

  private releaseClaims(holder: string, ids: readonly string[]): void {
    this.store.atomically(() => {
      for (const id of ids) {
        this.store.releaseClaim(id, holder);
      }
    });
  }

  private setCondenserDelegate(
    caller: AdminCaller,
    address: string,
    trusted: boolean,
  ): CondenserDelegateResult {
    requireAdmin(caller, this.adminRoles);
    const normalized = normalizeAddress(address, "condenser");
    return this.store.atomically(() => {
      const changed = this.store.setCondenserDelegate(normalized, trusted);
      if (!changed) return { address: normalized, changed };
      const event: RedemptionEvent = {
        type: trusted ? "CONDENSER_DELEGATE_ADDED" : "CONDENSER_DELEGATE_REMOVED",
        occurredAt: this.now().toISOString(),
        address: normalized,
        ...(caller.actor ? { actor: caller.actor } : {}),
      };
      return { address: normalized, changed, event: this.store.appendEvent(event) };
    });
  }
}
