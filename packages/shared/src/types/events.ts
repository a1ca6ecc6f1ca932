export type RedemptionEventType =
  | "CERTIFICATE_TYPE_CREATED"
  | "REDEEMED"
  | "CONDENSED_REDEEMED"
  | "CONDENSER_DELEGATE_ADDED"
  | "CONDENSER_DELEGATE_REMOVED"
  | "CREDIT_UNCONFIRMED";

export interface RedemptionEventBase {
  type: RedemptionEventType;
  occurredAt: string;   // ISO date
}

export interface CertificateTypeCreatedEvent extends RedemptionEventBase {
  type: "CERTIFICATE_TYPE_CREATED";
  certificateID: string;
  amount: string;
  delegates: string[];
  actor?: string;
}

export interface RedeemedEvent extends RedemptionEventBase {
  type: "REDEEMED";
  holder: string;
  amount: string;
  certificateID: string;
}

export interface CondensedRedeemedEvent extends RedemptionEventBase {
  type: "CONDENSED_REDEEMED";
  holder: string;
  amount: string;
  certificateIDs: string[];
}

export interface CondenserDelegateChangedEvent extends RedemptionEventBase {
  type: "CONDENSER_DELEGATE_ADDED" | "CONDENSER_DELEGATE_REMOVED";
  address: string;
  actor?: string;
}

/** Claims stay set; the ledger may or may not have applied the credit. */
export interface CreditUnconfirmedEvent extends RedemptionEventBase {
  type: "CREDIT_UNCONFIRMED";
  holder: string;
  amount: string;
  certificateIDs: string[];
  reason: string;
}

export type RedemptionEvent =
  | CertificateTypeCreatedEvent
  | RedeemedEvent
  | CondensedRedeemedEvent
  | CondenserDelegateChangedEvent
  | CreditUnconfirmedEvent;

export interface StoredRedemptionEvent {
  sequence: number;
  eventHash: string;    // sha256Hex(canonicalJson(event))
  event: RedemptionEvent;
}

export function eventCertificateIDs(event: RedemptionEvent): string[] {
  switch (event.type) {
    case "CERTIFICATE_TYPE_CREATED":
    case "REDEEMED":
      return [event.certificateID];
    case "CONDENSED_REDEEMED":
    case "CREDIT_UNCONFIRMED":
      return event.certificateIDs;
    default:
      return [];
  }
}

export function eventHolder(event: RedemptionEvent): string | null {
  if (
    event.type === "REDEEMED" ||
    event.type === "CONDENSED_REDEEMED" ||
    event.type === "CREDIT_UNCONFIRMED"
  ) {
    return event.holder;
  }
  return null;
}
