import assert from "node:assert/strict";
import { rmSync } from "node:fs";
import { createServer } from "node:http";
import test from "node:test";
import { computeCondensedIDsHash, computeRedemptionHash } from "@certclaim/shared";
import { buildServer, type BuildServerOptions } from "../server.js";
import {
  CONDENSER,
  CONDENSER_KEY,
  createTempDbPath,
  DELEGATE,
  DELEGATE_KEY,
  FakeCreditLedger,
  HOLDER,
  SERVICE_IDENTITY,
  signCondensedRedemption,
  signRedemption,
} from "./helpers.js";

const ADMIN_HEADERS = {
  "x-service-token": "svc-secret",
  "x-governance-role": "issuer_admin",
  "x-governance-actor": "issuer-ops-1",
};

async function withServer(
  run: (app: Awaited<ReturnType<typeof buildServer>>, ledger: FakeCreditLedger) => Promise<void>,
  options: BuildServerOptions = {},
) {
  const temp = createTempDbPath("certclaim-service-");
  const ledger = new FakeCreditLedger();
  const app = await buildServer({
    dbPath: temp.dbPath,
    creditLedger: ledger,
    serviceIdentity: SERVICE_IDENTITY,
    adminRoles: "issuer_admin",
    logger: false,
    ...options,
  });
  try {
    await run(app, ledger);
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
}

async function createCertificateType(
  app: Awaited<ReturnType<typeof buildServer>>,
  amount: string,
  metadata: string,
): Promise<string> {
  const res = await app.inject({
    method: "POST",
    url: "/certificate-types",
    headers: ADMIN_HEADERS,
    payload: { amount, delegates: [DELEGATE], metadata },
  });
  assert.equal(res.statusCode, 201);
  return (res.json() as { certificateID: string }).certificateID;
}

test("health endpoint reports the bound service identity", async () => {
  await withServer(async (app) => {
    const res = await app.inject({ method: "GET", url: "/health" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), {
      ok: true,
      service: "redemption-service",
      serviceIdentity: SERVICE_IDENTITY,
      condensedAmountPolicy: "recompute",
    });
  });
});

test("serves OpenAPI document", async () => {
  await withServer(async (app) => {
    const res = await app.inject({ method: "GET", url: "/openapi.json" });
    assert.equal(res.statusCode, 200);
    const body = res.json() as { openapi: string; paths: Record<string, unknown> };
    assert.equal(body.openapi, "3.0.3");
    assert.equal(typeof body.paths["/redemptions/condensed"], "object");
  });
});

test("requires the admin role to create certificate types", async () => {
  await withServer(async (app) => {
    const payload = { amount: "100", delegates: [DELEGATE], metadata: "ipfs://x" };
    const forbidden = await app.inject({
      method: "POST",
      url: "/certificate-types",
      headers: { "x-governance-role": "viewer" },
      payload,
    });
    assert.equal(forbidden.statusCode, 403);
    assert.equal((forbidden.json() as { error: string }).error, "admin_required");

    const created = await app.inject({
      method: "POST",
      url: "/certificate-types",
      headers: ADMIN_HEADERS,
      payload,
    });
    assert.equal(created.statusCode, 201);
    const body = created.json() as {
      certificateID: string;
      created: boolean;
      certificateType: { amount: string; metadata: string; delegates: string[] };
    };
    assert.equal(body.created, true);
    assert.equal(body.certificateType.amount, "100");
    assert.deepEqual(body.certificateType.delegates, [DELEGATE]);

    const again = await app.inject({
      method: "POST",
      url: "/certificate-types",
      headers: ADMIN_HEADERS,
      payload,
    });
    assert.equal(again.statusCode, 200);
    assert.equal((again.json() as { certificateID: string }).certificateID, body.certificateID);
  });
});

test("admin routes require the service token before the governance role", async () => {
  await withServer(
    async (app) => {
      const governanceOnly = {
        "x-governance-role": "issuer_admin",
        "x-governance-actor": "issuer-ops-1",
      };
      const create = await app.inject({
        method: "POST",
        url: "/certificate-types",
        headers: governanceOnly,
        payload: { amount: "100", delegates: [DELEGATE], metadata: "ipfs://x" },
      });
      assert.equal(create.statusCode, 401);
      assert.equal((create.json() as { error: string }).error, "unauthorized_service");

      const addCondenser = await app.inject({
        method: "POST",
        url: "/condenser-delegates",
        headers: governanceOnly,
        payload: { address: CONDENSER },
      });
      assert.equal(addCondenser.statusCode, 401);

      const removeCondenser = await app.inject({
        method: "DELETE",
        url: `/condenser-delegates/${CONDENSER}`,
        headers: { ...governanceOnly, "x-service-token": "wrong-secret" },
      });
      assert.equal(removeCondenser.statusCode, 401);

      const wrongRole = await app.inject({
        method: "POST",
        url: "/condenser-delegates",
        headers: { "x-service-token": "svc-secret", "x-governance-role": "viewer" },
        payload: { address: CONDENSER },
      });
      assert.equal(wrongRole.statusCode, 403);

      const list = await app.inject({ method: "GET", url: "/condenser-delegates" });
      assert.deepEqual(list.json(), { condenserDelegates: [] });
      const types = await app.inject({ method: "GET", url: "/certificate-types" });
      assert.deepEqual(types.json(), { certificateTypes: [] });

      const created = await app.inject({
        method: "POST",
        url: "/certificate-types",
        headers: ADMIN_HEADERS,
        payload: { amount: "100", delegates: [DELEGATE], metadata: "ipfs://x" },
      });
      assert.equal(created.statusCode, 201);
    },
    { serviceAuthToken: "svc-secret" },
  );
});

test("rejects malformed certificate type requests", async () => {
  await withServer(async (app) => {
    for (const payload of [
      { amount: "-1", delegates: [DELEGATE], metadata: "" },
      { amount: "1.5", delegates: [DELEGATE], metadata: "" },
      { amount: "1", delegates: "not-a-list", metadata: "" },
    ]) {
      const res = await app.inject({
        method: "POST",
        url: "/certificate-types",
        headers: ADMIN_HEADERS,
        payload,
      });
      assert.equal(res.statusCode, 400);
    }

    const badDelegate = await app.inject({
      method: "POST",
      url: "/certificate-types",
      headers: ADMIN_HEADERS,
      payload: { amount: "1", delegates: ["delegate-1"], metadata: "" },
    });
    assert.equal(badDelegate.statusCode, 400);
    assert.equal((badDelegate.json() as { error: string }).error, "invalid_input");
  });
});

test("redeems a certificate once over HTTP", async () => {
  await withServer(async (app, ledger) => {
    const certificateID = await createCertificateType(app, "100", "ipfs://x");

    const lookup = await app.inject({ method: "GET", url: `/certificate-types/${certificateID}` });
    assert.equal(lookup.statusCode, 200);

    const signature = signRedemption(DELEGATE_KEY, certificateID, HOLDER);
    const redeemRes = await app.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature, certificateID },
    });
    assert.equal(redeemRes.statusCode, 200);
    const redeemBody = redeemRes.json() as {
      redeemed: boolean;
      receipt: { amount: string; holder: string; signer: string };
    };
    assert.equal(redeemBody.redeemed, true);
    assert.equal(redeemBody.receipt.amount, "100");
    assert.equal(redeemBody.receipt.holder, HOLDER);
    assert.equal(redeemBody.receipt.signer, DELEGATE);
    assert.equal(ledger.balanceOf(HOLDER), 100n);

    const claimRes = await app.inject({
      method: "GET",
      url: `/certificate-types/${certificateID}/claims/${HOLDER}`,
    });
    assert.equal((claimRes.json() as { claimed: boolean }).claimed, true);

    const repeat = await app.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature, certificateID },
    });
    assert.equal(repeat.statusCode, 409);
    assert.equal((repeat.json() as { error: string }).error, "already_claimed");
    assert.equal(ledger.balanceOf(HOLDER), 100n);
  });
});

test("an unconfirmed credit answers 504 and keeps the claim", async () => {
  await withServer(async (app, ledger) => {
    const certificateID = await createCertificateType(app, "100", "ipfs://x");
    const signature = signRedemption(DELEGATE_KEY, certificateID, HOLDER);

    ledger.failNext = new Error("socket hang up");
    const first = await app.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature, certificateID },
    });
    assert.equal(first.statusCode, 504);
    assert.equal((first.json() as { error: string }).error, "credit_unconfirmed");

    const retry = await app.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature, certificateID },
    });
    assert.equal(retry.statusCode, 409);
    assert.equal(ledger.credits.length, 0);
  });
});

test("redemption needs an authenticated caller", async () => {
  await withServer(
    async (app) => {
      const certificateID = await createCertificateType(app, "100", "ipfs://x");
      const signature = signRedemption(DELEGATE_KEY, certificateID, HOLDER);

      const noToken = await app.inject({
        method: "POST",
        url: "/redemptions",
        headers: { "x-caller-address": HOLDER },
        payload: { signature, certificateID },
      });
      assert.equal(noToken.statusCode, 401);
      assert.equal((noToken.json() as { error: string }).error, "unauthorized_service");

      const noCaller = await app.inject({
        method: "POST",
        url: "/redemptions",
        headers: { "x-service-token": "svc-secret" },
        payload: { signature, certificateID },
      });
      assert.equal(noCaller.statusCode, 401);
      assert.equal((noCaller.json() as { error: string }).error, "unauthenticated_caller");

      const ok = await app.inject({
        method: "POST",
        url: "/redemptions",
        headers: { "x-service-token": "svc-secret", "x-caller-address": HOLDER },
        payload: { signature, certificateID },
      });
      assert.equal(ok.statusCode, 200);
    },
    { serviceAuthToken: "svc-secret" },
  );
});

test("maps signature failures to client errors", async () => {
  await withServer(async (app) => {
    const certificateID = await createCertificateType(app, "100", "ipfs://x");

    const malformed = await app.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature: "0x1234", certificateID },
    });
    assert.equal(malformed.statusCode, 400);
    assert.equal((malformed.json() as { error: string }).error, "invalid_signature_format");

    const wrongSigner = await app.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature: signRedemption(CONDENSER_KEY, certificateID, HOLDER), certificateID },
    });
    assert.equal(wrongSigner.statusCode, 403);
    assert.equal((wrongSigner.json() as { error: string }).error, "unauthorized");
  });
});

test("condensed redemption over HTTP", async () => {
  await withServer(async (app, ledger) => {
    const c1 = await createCertificateType(app, "100", "one");
    const c2 = await createCertificateType(app, "50", "two");

    const addRes = await app.inject({
      method: "POST",
      url: "/condenser-delegates",
      headers: ADMIN_HEADERS,
      payload: { address: CONDENSER },
    });
    assert.equal(addRes.statusCode, 200);
    assert.deepEqual(addRes.json(), { address: CONDENSER, condenserDelegate: true });

    const listRes = await app.inject({ method: "GET", url: "/condenser-delegates" });
    assert.deepEqual(listRes.json(), { condenserDelegates: [CONDENSER] });

    const signature = signCondensedRedemption(CONDENSER_KEY, [c1, c2], 150n, HOLDER);
    const res = await app.inject({
      method: "POST",
      url: "/redemptions/condensed",
      headers: { "x-caller-address": HOLDER },
      payload: { signature, combinedAmount: "150", certificateIDs: [c1, c2] },
    });
    assert.equal(res.statusCode, 200);
    const body = res.json() as { receipt: { amount: string; certificateIDs: string[] } };
    assert.equal(body.receipt.amount, "150");
    assert.deepEqual(body.receipt.certificateIDs, [c1, c2]);
    assert.equal(ledger.balanceOf(HOLDER), 150n);

    const removeRes = await app.inject({
      method: "DELETE",
      url: `/condenser-delegates/${CONDENSER}`,
      headers: ADMIN_HEADERS,
    });
    assert.equal(removeRes.statusCode, 200);
    const membership = await app.inject({ method: "GET", url: `/condenser-delegates/${CONDENSER}` });
    assert.equal((membership.json() as { condenserDelegate: boolean }).condenserDelegate, false);
  });
});

test("condensed amount mismatch is a conflict", async () => {
  await withServer(async (app) => {
    const c1 = await createCertificateType(app, "100", "one");
    await app.inject({
      method: "POST",
      url: "/condenser-delegates",
      headers: ADMIN_HEADERS,
      payload: { address: CONDENSER },
    });

    const res = await app.inject({
      method: "POST",
      url: "/redemptions/condensed",
      headers: { "x-caller-address": HOLDER },
      payload: {
        signature: signCondensedRedemption(CONDENSER_KEY, [c1], 500n, HOLDER),
        combinedAmount: "500",
        certificateIDs: [c1],
      },
    });
    assert.equal(res.statusCode, 409);
    assert.equal((res.json() as { error: string }).error, "amount_mismatch");
  });
});

test("hash helpers reproduce the bytes signers must sign", async () => {
  await withServer(async (app) => {
    const certificateID = await createCertificateType(app, "100", "ipfs://x");

    const idRes = await app.inject({
      method: "POST",
      url: "/hashes/certificate-id",
      payload: { amount: "100", delegates: [DELEGATE], metadata: "ipfs://x" },
    });
    assert.deepEqual(idRes.json(), { hash: certificateID });

    const redemptionRes = await app.inject({
      method: "POST",
      url: "/hashes/redemption",
      payload: { certificateID, holder: HOLDER },
    });
    assert.deepEqual(redemptionRes.json(), {
      hash: computeRedemptionHash(SERVICE_IDENTITY, certificateID, HOLDER),
    });

    const condensedRes = await app.inject({
      method: "POST",
      url: "/hashes/condensed-redemption",
      payload: { certificateIDs: [certificateID], combinedAmount: "100", holder: HOLDER },
    });
    const condensedBody = condensedRes.json() as { hash: string; condensedIDsHash: string };
    assert.equal(condensedBody.condensedIDsHash, computeCondensedIDsHash([certificateID]));
    assert.match(condensedBody.hash, /^0x[0-9a-f]{64}$/);
  });
});

test("unknown certificate types are reported as not found", async () => {
  await withServer(async (app) => {
    const res = await app.inject({
      method: "GET",
      url: `/certificate-types/0x${"ee".repeat(32)}`,
    });
    assert.equal(res.statusCode, 404);

    const malformed = await app.inject({ method: "GET", url: "/certificate-types/not-an-id" });
    assert.equal(malformed.statusCode, 400);
  });
});

test("lists events by holder", async () => {
  await withServer(async (app) => {
    const certificateID = await createCertificateType(app, "100", "ipfs://x");
    await app.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature: signRedemption(DELEGATE_KEY, certificateID, HOLDER), certificateID },
    });

    const all = await app.inject({ method: "GET", url: "/events" });
    const allBody = all.json() as { events: Array<{ event: { type: string } }> };
    assert.deepEqual(
      allBody.events.map((stored) => stored.event.type),
      ["CERTIFICATE_TYPE_CREATED", "REDEEMED"],
    );

    const byHolder = await app.inject({ method: "GET", url: `/events?holder=${HOLDER}` });
    const byHolderBody = byHolder.json() as { events: Array<{ event: { type: string } }> };
    assert.deepEqual(
      byHolderBody.events.map((stored) => stored.event.type),
      ["REDEEMED"],
    );
  });
});

test("claims persist across server restart", async () => {
  const temp = createTempDbPath("certclaim-restart-");
  const options = {
    dbPath: temp.dbPath,
    serviceIdentity: SERVICE_IDENTITY,
    adminRoles: "issuer_admin",
    logger: false,
  };
  const ledger = new FakeCreditLedger();
  const app1 = await buildServer({ ...options, creditLedger: ledger });
  let certificateID = "";
  let signature = "";
  try {
    certificateID = await createCertificateType(app1, "100", "ipfs://x");
    signature = signRedemption(DELEGATE_KEY, certificateID, HOLDER);
    const res = await app1.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature, certificateID },
    });
    assert.equal(res.statusCode, 200);
  } finally {
    await app1.close();
  }

  const app2 = await buildServer({ ...options, creditLedger: ledger });
  try {
    const repeat = await app2.inject({
      method: "POST",
      url: "/redemptions",
      headers: { "x-caller-address": HOLDER },
      payload: { signature, certificateID },
    });
    assert.equal(repeat.statusCode, 409);
    assert.equal(ledger.balanceOf(HOLDER), 100n);
  } finally {
    await app2.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("refuses to start without a service identity or ledger", async () => {
  const saved = {
    SERVICE_IDENTITY: process.env.SERVICE_IDENTITY,
    ASSET_CONTRACT_ADDRESS: process.env.ASSET_CONTRACT_ADDRESS,
    CREDIT_LEDGER_URL: process.env.CREDIT_LEDGER_URL,
  };
  delete process.env.SERVICE_IDENTITY;
  delete process.env.ASSET_CONTRACT_ADDRESS;
  delete process.env.CREDIT_LEDGER_URL;
  try {
    await assert.rejects(
      buildServer({ creditLedger: new FakeCreditLedger(), logger: false }),
      /SERVICE_IDENTITY is required/,
    );
    await assert.rejects(
      buildServer({ serviceIdentity: SERVICE_IDENTITY, logger: false }),
      /ASSET_CONTRACT_ADDRESS or CREDIT_LEDGER_URL is required/,
    );
  } finally {
    for (const [key, value] of Object.entries(saved)) {
      if (value !== undefined) process.env[key] = value;
    }
  }
});

test("forwards committed events to the event sink", async () => {
  const received: Array<{ path: string | undefined; token: unknown; type: unknown }> = [];
  const sink = createServer((req, res) => {
    let body = "";
    req.on("data", (chunk) => {
      body += chunk;
    });
    req.on("end", () => {
      const parsed = JSON.parse(body) as { event: { type: string } };
      received.push({
        path: req.url,
        token: req.headers["x-service-token"],
        type: parsed.event.type,
      });
      res.writeHead(202).end();
    });
  });
  await new Promise<void>((resolve) => sink.listen(0, "127.0.0.1", resolve));
  const address = sink.address();
  const port = typeof address === "object" && address ? address.port : 0;

  try {
    await withServer(
      async (app) => {
        const certificateID = await createCertificateType(app, "100", "ipfs://x");
        const res = await app.inject({
          method: "POST",
          url: "/redemptions",
          headers: { "x-service-token": "svc-secret", "x-caller-address": HOLDER },
          payload: { signature: signRedemption(DELEGATE_KEY, certificateID, HOLDER), certificateID },
        });
        assert.equal(res.statusCode, 200);
      },
      { eventSinkUrl: `http://127.0.0.1:${port}/`, serviceAuthToken: "svc-secret" },
    );
  } finally {
    await new Promise<void>((resolve) => sink.close(() => resolve()));
  }

  assert.deepEqual(received, [
    { path: "/ingest/redemption-event", token: "svc-secret", type: "CERTIFICATE_TYPE_CREATED" },
    { path: "/ingest/redemption-event", token: "svc-secret", type: "REDEEMED" },
  ]);
});
