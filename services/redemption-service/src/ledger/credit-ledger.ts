import { buildServiceAuthHeaders } from "@certclaim/shared";

export interface CreditResult {
  creditRef?: string;
}

export interface CreditLedgerStatus {
  kind: "token-contract" | "http" | "memory";
  endpoint?: string;
  assetAddress?: string;
  signerAddress?: string;
  latestBlock?: number;
  error?: string;
}

/**
 * Thrown by a ledger when it knows the credit was not applied. Any other
 * error from `credit` leaves the outcome unknown.
 */
export class CreditNotAppliedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CreditNotAppliedError";
  }
}

/**
 * The external asset ledger. `credit` resolves once the credit took effect,
 * throws CreditNotAppliedError when it definitely did not, and may call back
 * into the redemption service.
 */
export interface CreditLedger {
  credit(holder: string, amount: bigint): Promise<CreditResult>;
  status(): Promise<CreditLedgerStatus>;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseJsonBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class HttpCreditLedger implements CreditLedger {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly serviceAuthToken?: string,
    private readonly timeoutMs = 5000,
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
  }

  /** Timeouts and network failures surface as plain errors: the ledger may have applied the credit. */
  async credit(holder: string, amount: bigint): Promise<CreditResult> {
    const response = await fetch(`${this.baseUrl}/credits`, {
      method: "POST",
      headers: {
        ...buildServiceAuthHeaders(this.serviceAuthToken),
        "content-type": "application/json",
      },
      body: JSON.stringify({ holder, amount: amount.toString() }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new CreditNotAppliedError(`credit ledger responded with ${response.status}`);
    }

    // The credit has taken effect once the ledger answers 2xx; a missing or
    // unreadable body only loses the reference.
    const body = parseJsonBody(await response.text());
    if (isObject(body) && typeof body.creditRef === "string") {
      return { creditRef: body.creditRef };
    }
    return {};
  }

  async status(): Promise<CreditLedgerStatus> {
    return { kind: "http", endpoint: this.baseUrl };
  }
}
