import type {
  CertificateType,
  CondensedRedemptionReceipt,
  RedemptionReceipt,
} from "./certificate.js";
import type { StoredRedemptionEvent } from "./events.js";

export interface CreateCertificateTypeRequest {
  amount: string;
  delegates: string[];
  metadata: string;
}

export interface CreateCertificateTypeResponse {
  certificateID: string;
  created: boolean;
  certificateType: CertificateType;
}

export interface GetCertificateTypeResponse {
  certificateType: CertificateType;
}

export interface ListCertificateTypesResponse {
  certificateTypes: CertificateType[];
}

export interface DelegateLookupResponse {
  certificateID: string;
  address: string;
  delegate: boolean;
}

export interface ClaimLookupResponse {
  certificateID: string;
  holder: string;
  claimed: boolean;
}

export interface CondenserDelegateRequest {
  address: string;
}

export interface CondenserDelegateResponse {
  address: string;
  condenserDelegate: boolean;
}

export interface ListCondenserDelegatesResponse {
  condenserDelegates: string[];
}

export interface RedeemRequest {
  signature: string;
  certificateID: string;
}

export interface RedeemResponse {
  redeemed: true;
  receipt: RedemptionReceipt;
}

export interface RedeemCondensedRequest {
  signature: string;
  combinedAmount: string;
  certificateIDs: string[];
}

export interface RedeemCondensedResponse {
  redeemed: true;
  receipt: CondensedRedemptionReceipt;
}

export interface CertificateIDHashRequest {
  amount: string;
  delegates: string[];
  metadata: string;
}

export interface RedemptionHashRequest {
  certificateID: string;
  holder: string;
}

export interface CondensedIDsHashRequest {
  certificateIDs: string[];
}

export interface CondensedRedemptionHashRequest {
  certificateIDs: string[];
  combinedAmount: string;
  holder: string;
}

export interface HashResponse {
  hash: string;
  condensedIDsHash?: string;
}

export interface ListEventsResponse {
  events: StoredRedemptionEvent[];
}

export interface ErrorResponse {
  error: string;
  message?: string;
}
