export interface CertificateType {
  certificateID: string;    // computeCertificateID(service, amount, delegates, metadata)
  amount: string;           // uint256 as a decimal string
  metadata: string;         // opaque, e.g. "ipfs://..."
  delegates: string[];      // checksummed addresses; any one signature suffices
  createdAt: string;        // ISO date
}

export type CondensedAmountPolicy = "recompute" | "attested";

export interface RedemptionReceipt {
  certificateID: string;
  holder: string;
  signer: string;
  amount: string;
  redeemedAt: string;
  creditRef?: string;
}

export interface CondensedRedemptionReceipt {
  certificateIDs: string[];
  holder: string;
  signer: string;
  amount: string;
  redeemedAt: string;
  creditRef?: string;
}
