import Fastify from "fastify";
import type { FastifyBaseLogger, FastifyReply } from "fastify";
import {
  buildServiceAuthHeaders,
  CALLER_ADDRESS_HEADER,
  type ClaimLookupResponse,
  type CondensedAmountPolicy,
  type CondenserDelegateResponse,
  computeCertificateID,
  computeCondensedIDsHash,
  computeCondensedRedemptionHash,
  computeRedemptionHash,
  type CertificateIDHashRequest,
  type CondensedIDsHashRequest,
  type CondensedRedemptionHashRequest,
  type CondenserDelegateRequest,
  type CreateCertificateTypeRequest,
  type CreateCertificateTypeResponse,
  type DelegateLookupResponse,
  type ErrorResponse,
  type GetCertificateTypeResponse,
  type HashResponse,
  isRedemptionError,
  isServiceAuthAuthorized,
  type ListCertificateTypesResponse,
  type ListCondenserDelegatesResponse,
  type ListEventsResponse,
  parseAdminRoleSet,
  parseCallerAddressHeader,
  readAdminCaller,
  type RedeemCondensedRequest,
  type RedeemCondensedResponse,
  type RedeemRequest,
  type RedeemResponse,
  type RedemptionErrorCode,
  type RedemptionHashRequest,
  SERVICE_AUTH_HEADER,
  type StoredRedemptionEvent,
} from "@certclaim/shared";
import { RedemptionEngine } from "./engine/redemption-engine.js";
import { buildCreditLedgerFromEnv, type CreditLedger } from "./ledger/index.js";
import { buildOpenApiSpec } from "./openapi.js";
import {
  type RedemptionStore,
  SqliteRedemptionStore,
} from "./storage/redemption-store.js";

const DEFAULT_DB_PATH = "data/redemption-service.db";
const MAX_UINT256_DIGITS = 78;

const ERROR_STATUS: Record<RedemptionErrorCode, number> = {
  INVALID_INPUT: 400,
  INVALID_SIGNATURE_FORMAT: 400,
  SIGNATURE_RECOVERY_FAILED: 400,
  UNAUTHORIZED: 403,
  ADMIN_REQUIRED: 403,
  ALREADY_CLAIMED: 409,
  AMOUNT_MISMATCH: 409,
  CREDIT_FAILED: 502,
  CREDIT_UNCONFIRMED: 504,
};

export interface BuildServerOptions {
  store?: RedemptionStore;
  dbPath?: string;
  creditLedger?: CreditLedger;
  serviceIdentity?: string;
  adminRoles?: string;
  serviceAuthToken?: string;
  condensedAmountPolicy?: CondensedAmountPolicy;
  eventSinkUrl?: string;
  serviceBaseUrl?: string;
  logger?: boolean;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => isNonEmptyString(item));
}

function isUnsignedInteger(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value) && value.length <= MAX_UINT256_DIGITS;
}

function isCondensedAmountPolicy(value: unknown): value is CondensedAmountPolicy {
  return value === "recompute" || value === "attested";
}

function errorCodeName(code: RedemptionErrorCode): string {
  return code.toLowerCase();
}

function parseCreateCertificateTypeRequest(body: unknown): CreateCertificateTypeRequest | null {
  if (!isObject(body)) return null;
  if (!isUnsignedInteger(body.amount)) return null;
  if (!isStringArray(body.delegates)) return null;
  if (typeof body.metadata !== "string") return null;
  return {
    amount: body.amount,
    delegates: body.delegates,
    metadata: body.metadata,
  };
}

function parseRedeemRequest(body: unknown): RedeemRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.signature)) return null;
  if (!isNonEmptyString(body.certificateID)) return null;
  return {
    signature: body.signature,
    certificateID: body.certificateID,
  };
}

function parseRedeemCondensedRequest(body: unknown): RedeemCondensedRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.signature)) return null;
  if (!isUnsignedInteger(body.combinedAmount)) return null;
  if (!isStringArray(body.certificateIDs)) return null;
  return {
    signature: body.signature,
    combinedAmount: body.combinedAmount,
    certificateIDs: body.certificateIDs,
  };
}

function parseCondenserDelegateRequest(body: unknown): CondenserDelegateRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.address)) return null;
  return { address: body.address };
}

function parseCertificateIDHashRequest(body: unknown): CertificateIDHashRequest | null {
  return parseCreateCertificateTypeRequest(body);
}

function parseRedemptionHashRequest(body: unknown): RedemptionHashRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.certificateID)) return null;
  if (!isNonEmptyString(body.holder)) return null;
  return { certificateID: body.certificateID, holder: body.holder };
}

function parseCondensedIDsHashRequest(body: unknown): CondensedIDsHashRequest | null {
  if (!isObject(body)) return null;
  if (!isStringArray(body.certificateIDs)) return null;
  return { certificateIDs: body.certificateIDs };
}

function parseCondensedRedemptionHashRequest(
  body: unknown,
): CondensedRedemptionHashRequest | null {
  if (!isObject(body)) return null;
  if (!isStringArray(body.certificateIDs)) return null;
  if (!isUnsignedInteger(body.combinedAmount)) return null;
  if (!isNonEmptyString(body.holder)) return null;
  return {
    certificateIDs: body.certificateIDs,
    combinedAmount: body.combinedAmount,
    holder: body.holder,
  };
}

function replyWithError(reply: FastifyReply, error: unknown) {
  if (!isRedemptionError(error)) {
    throw error;
  }
  if (error.code === "CREDIT_FAILED") {
    reply.log.error({ err: error }, "credit ledger rejected redemption");
  } else if (error.code === "CREDIT_UNCONFIRMED") {
    reply.log.error({ err: error }, "credit outcome unknown; claims kept for reconciliation");
  } else {
    reply.log.info({ code: error.code }, error.message);
  }
  const body: ErrorResponse = {
    error: errorCodeName(error.code),
    message: error.message,
  };
  return reply.code(ERROR_STATUS[error.code]).send(body);
}

async function tryPublishEvent(
  eventSinkUrl: string | undefined,
  stored: StoredRedemptionEvent | undefined,
  serviceAuthToken: string | undefined,
  log: FastifyBaseLogger,
): Promise<void> {
  if (!eventSinkUrl || !stored) return;
  try {
    const response = await fetch(`${eventSinkUrl.replace(/\/$/, "")}/ingest/redemption-event`, {
      method: "POST",
      headers: { ...buildServiceAuthHeaders(serviceAuthToken), "content-type": "application/json" },
      body: JSON.stringify(stored),
      signal: AbortSignal.timeout(3000),
    });
    if (!response.ok) {
      log.warn({ statusCode: response.status, sequence: stored.sequence }, "event sink rejected event");
    }
  } catch (error) {
    // Best-effort publish; the redemption itself is already committed.
    log.warn({ err: error, sequence: stored.sequence }, "event sink unreachable");
  }
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  const serviceIdentity = options.serviceIdentity || process.env.SERVICE_IDENTITY;
  if (!serviceIdentity) {
    throw new Error("SERVICE_IDENTITY is required (or pass serviceIdentity in buildServer options)");
  }
  const creditLedger = options.creditLedger || buildCreditLedgerFromEnv();
  if (!creditLedger) {
    throw new Error(
      "ASSET_CONTRACT_ADDRESS or CREDIT_LEDGER_URL is required (or pass creditLedger in buildServer options)",
    );
  }
  const policyRaw = options.condensedAmountPolicy ?? process.env.CONDENSED_AMOUNT_POLICY;
  if (policyRaw !== undefined && !isCondensedAmountPolicy(policyRaw)) {
    throw new Error(`CONDENSED_AMOUNT_POLICY must be 'recompute' or 'attested', got '${policyRaw}'`);
  }

  const store =
    options.store ||
    new SqliteRedemptionStore(options.dbPath || process.env.REDEMPTION_DB_PATH || DEFAULT_DB_PATH);
  const ownStore = !options.store;
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;
  const eventSinkUrl = options.eventSinkUrl ?? process.env.EVENT_SINK_URL;
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4110}`;

  const engine = new RedemptionEngine({
    store,
    creditLedger,
    serviceIdentity,
    adminRoles: parseAdminRoleSet(options.adminRoles ?? process.env.ADMIN_ROLES),
    condensedAmountPolicy: policyRaw,
  });

  function requireServiceAuth(
    req: { headers: Record<string, unknown> },
    reply: FastifyReply,
  ): boolean {
    if (isServiceAuthAuthorized(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return true;
    }
    reply.code(401).send({
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return false;
  }

  /** Returns the authenticated holder, or replies 401 and returns null. */
  function requireCaller(
    req: { headers: Record<string, unknown> },
    reply: FastifyReply,
  ): string | null {
    if (!requireServiceAuth(req, reply)) return null;
    const caller = parseCallerAddressHeader(req.headers[CALLER_ADDRESS_HEADER]);
    if (!caller) {
      reply.code(401).send({
        error: "unauthenticated_caller",
        message: `Missing or invalid '${CALLER_ADDRESS_HEADER}' header`,
      });
      return null;
    }
    return caller;
  }

  app.get("/health", async () => ({
    ok: true,
    service: "redemption-service",
    serviceIdentity: engine.serviceIdentity,
    condensedAmountPolicy: engine.condensedAmountPolicy,
  }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));
  app.get("/ledger/status", async () => creditLedger.status());

  app.post("/certificate-types", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return reply;
    const parsed = parseCreateCertificateTypeRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected amount (unsigned integer string), delegates array and metadata string",
      });
    }

    try {
      const result = engine.createCertificateType(
        readAdminCaller(req.headers),
        BigInt(parsed.amount),
        parsed.delegates,
        parsed.metadata,
      );
      req.log.info(
        { certificateID: result.certificateID, created: result.created },
        "certificate type registered",
      );
      await tryPublishEvent(eventSinkUrl, result.event, serviceAuthToken, req.log);
      const response: CreateCertificateTypeResponse = {
        certificateID: result.certificateID,
        created: result.created,
        certificateType: result.certificateType,
      };
      return reply.code(result.created ? 201 : 200).send(response);
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.get("/certificate-types", async () => {
    const response: ListCertificateTypesResponse = {
      certificateTypes: engine.listCertificateTypes(),
    };
    return response;
  });

  app.get<{ Params: { certificateID: string } }>(
    "/certificate-types/:certificateID",
    async (req, reply) => {
      try {
        const certificateType = engine.getCertificateType(req.params.certificateID);
        if (!certificateType) {
          return reply.code(404).send({ error: "certificate_type_not_found" });
        }
        const response: GetCertificateTypeResponse = { certificateType };
        return response;
      } catch (error) {
        return replyWithError(reply, error);
      }
    },
  );

  app.get<{ Params: { certificateID: string; address: string } }>(
    "/certificate-types/:certificateID/delegates/:address",
    async (req, reply) => {
      try {
        const response: DelegateLookupResponse = {
          certificateID: req.params.certificateID.toLowerCase(),
          address: req.params.address,
          delegate: engine.isDelegate(req.params.certificateID, req.params.address),
        };
        return response;
      } catch (error) {
        return replyWithError(reply, error);
      }
    },
  );

  app.get<{ Params: { certificateID: string; holder: string } }>(
    "/certificate-types/:certificateID/claims/:holder",
    async (req, reply) => {
      try {
        const response: ClaimLookupResponse = {
          certificateID: req.params.certificateID.toLowerCase(),
          holder: req.params.holder,
          claimed: engine.isClaimed(req.params.certificateID, req.params.holder),
        };
        return response;
      } catch (error) {
        return replyWithError(reply, error);
      }
    },
  );

  app.get("/condenser-delegates", async () => {
    const response: ListCondenserDelegatesResponse = {
      condenserDelegates: engine.listCondenserDelegates(),
    };
    return response;
  });

  app.get<{ Params: { address: string } }>("/condenser-delegates/:address", async (req, reply) => {
    try {
      const response: CondenserDelegateResponse = {
        address: req.params.address,
        condenserDelegate: engine.isCondenserDelegate(req.params.address),
      };
      return response;
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.post("/condenser-delegates", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return reply;
    const parsed = parseCondenserDelegateRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({ error: "invalid_request", message: "Expected address" });
    }
    try {
      const result = engine.addCondenserDelegate(readAdminCaller(req.headers), parsed.address);
      await tryPublishEvent(eventSinkUrl, result.event, serviceAuthToken, req.log);
      const response: CondenserDelegateResponse = {
        address: result.address,
        condenserDelegate: true,
      };
      return response;
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.delete<{ Params: { address: string } }>(
    "/condenser-delegates/:address",
    async (req, reply) => {
      if (!requireServiceAuth(req, reply)) return reply;
      try {
        const result = engine.removeCondenserDelegate(
          readAdminCaller(req.headers),
          req.params.address,
        );
        await tryPublishEvent(eventSinkUrl, result.event, serviceAuthToken, req.log);
        const response: CondenserDelegateResponse = {
          address: result.address,
          condenserDelegate: false,
        };
        return response;
      } catch (error) {
        return replyWithError(reply, error);
      }
    },
  );

  app.post("/redemptions", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return reply;

    const parsed = parseRedeemRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected signature and certificateID",
      });
    }

    try {
      const { receipt, event } = await engine.redeem(
        caller,
        parsed.signature,
        parsed.certificateID,
      );
      req.log.info(
        { certificateID: receipt.certificateID, holder: receipt.holder, amount: receipt.amount },
        "certificate redeemed",
      );
      await tryPublishEvent(eventSinkUrl, event, serviceAuthToken, req.log);
      const response: RedeemResponse = { redeemed: true, receipt };
      return response;
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.post("/redemptions/condensed", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return reply;

    const parsed = parseRedeemCondensedRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected signature, combinedAmount (unsigned integer string) and certificateIDs",
      });
    }

    try {
      const { receipt, event } = await engine.redeemCondensed(
        caller,
        parsed.signature,
        BigInt(parsed.combinedAmount),
        parsed.certificateIDs,
      );
      req.log.info(
        { certificateIDs: receipt.certificateIDs, holder: receipt.holder, amount: receipt.amount },
        "condensed redemption completed",
      );
      await tryPublishEvent(eventSinkUrl, event, serviceAuthToken, req.log);
      const response: RedeemCondensedResponse = { redeemed: true, receipt };
      return response;
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.post("/hashes/certificate-id", async (req, reply) => {
    const parsed = parseCertificateIDHashRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected amount, delegates and metadata",
      });
    }
    try {
      const response: HashResponse = {
        hash: computeCertificateID(
          engine.serviceIdentity,
          BigInt(parsed.amount),
          parsed.delegates,
          parsed.metadata,
        ),
      };
      return response;
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.post("/hashes/redemption", async (req, reply) => {
    const parsed = parseRedemptionHashRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected certificateID and holder",
      });
    }
    try {
      const response: HashResponse = {
        hash: computeRedemptionHash(engine.serviceIdentity, parsed.certificateID, parsed.holder),
      };
      return response;
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.post("/hashes/condensed-ids", async (req, reply) => {
    const parsed = parseCondensedIDsHashRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({ error: "invalid_request", message: "Expected certificateIDs" });
    }
    try {
      const response: HashResponse = { hash: computeCondensedIDsHash(parsed.certificateIDs) };
      return response;
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.post("/hashes/condensed-redemption", async (req, reply) => {
    const parsed = parseCondensedRedemptionHashRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected certificateIDs, combinedAmount and holder",
      });
    }
    try {
      const condensedIDsHash = computeCondensedIDsHash(parsed.certificateIDs);
      const response: HashResponse = {
        hash: computeCondensedRedemptionHash(
          engine.serviceIdentity,
          condensedIDsHash,
          BigInt(parsed.combinedAmount),
          parsed.holder,
        ),
        condensedIDsHash,
      };
      return response;
    } catch (error) {
      return replyWithError(reply, error);
    }
  });

  app.get<{ Querystring: { certificateID?: string; holder?: string } }>(
    "/events",
    async (req, reply) => {
      try {
        const response: ListEventsResponse = {
          events: engine.listEvents({
            certificateID: req.query.certificateID,
            holder: req.query.holder,
          }),
        };
        return response;
      } catch (error) {
        return replyWithError(reply, error);
      }
    },
  );

  app.addHook("onClose", async () => {
    if (ownStore) {
      store.close();
    }
  });

  return app;
}
