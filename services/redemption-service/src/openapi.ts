export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Certificate Redemption Service API",
      version: "0.1.0",
      description: "Certificate types, delegate-signed redemptions and condensed redemptions.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/ledger/status": {
        get: {
          summary: "Credit ledger connectivity",
          responses: {
            "200": { description: "Ledger status" },
          },
        },
      },
      "/certificate-types": {
        post: {
          summary: "Create (or re-assert) a certificate type; admin only",
          responses: {
            "201": { description: "Certificate type created" },
            "200": { description: "Certificate type already existed; delegates merged" },
            "400": { description: "Invalid request" },
            "401": { description: "Missing or invalid service token" },
            "403": { description: "Admin role required" },
          },
        },
        get: {
          summary: "List certificate types",
          responses: {
            "200": { description: "Certificate types" },
          },
        },
      },
      "/certificate-types/{certificateID}": {
        get: {
          summary: "Get certificate type by ID",
          parameters: [
            {
              in: "path",
              name: "certificateID",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Certificate type found" },
            "404": { description: "Certificate type not found" },
          },
        },
      },
      "/certificate-types/{certificateID}/delegates/{address}": {
        get: {
          summary: "Check whether an address may sign redemptions for a certificate type",
          parameters: [
            {
              in: "path",
              name: "certificateID",
              required: true,
              schema: { type: "string" },
            },
            {
              in: "path",
              name: "address",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Delegate lookup" },
          },
        },
      },
      "/certificate-types/{certificateID}/claims/{holder}": {
        get: {
          summary: "Check whether a holder has redeemed a certificate type",
          parameters: [
            {
              in: "path",
              name: "certificateID",
              required: true,
              schema: { type: "string" },
            },
            {
              in: "path",
              name: "holder",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Claim lookup" },
          },
        },
      },
      "/condenser-delegates": {
        post: {
          summary: "Trust an address to sign condensed redemptions; admin only",
          responses: {
            "200": { description: "Condenser delegate added" },
            "401": { description: "Missing or invalid service token" },
            "403": { description: "Admin role required" },
          },
        },
        get: {
          summary: "List condenser delegates",
          responses: {
            "200": { description: "Condenser delegates" },
          },
        },
      },
      "/condenser-delegates/{address}": {
        get: {
          summary: "Check condenser delegate membership",
          parameters: [
            {
              in: "path",
              name: "address",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Membership lookup" },
          },
        },
        delete: {
          summary: "Revoke a condenser delegate; admin only",
          parameters: [
            {
              in: "path",
              name: "address",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Condenser delegate removed" },
            "401": { description: "Missing or invalid service token" },
            "403": { description: "Admin role required" },
          },
        },
      },
      "/redemptions": {
        post: {
          summary: "Redeem one certificate with a delegate signature",
          responses: {
            "200": { description: "Redeemed" },
            "400": { description: "Invalid request or signature" },
            "401": { description: "Caller not authenticated" },
            "403": { description: "Signer is not a delegate" },
            "409": { description: "Already claimed" },
            "502": { description: "Credit ledger refused the credit; claim released" },
            "504": { description: "Credit outcome unknown; claim kept" },
          },
        },
      },
      "/redemptions/condensed": {
        post: {
          summary: "Redeem several certificates with one condenser signature",
          responses: {
            "200": { description: "Redeemed" },
            "400": { description: "Invalid request or signature" },
            "401": { description: "Caller not authenticated" },
            "403": { description: "Signer is not a condenser delegate" },
            "409": { description: "Already claimed or amount mismatch" },
            "502": { description: "Credit ledger refused the credit; claim released" },
            "504": { description: "Credit outcome unknown; claim kept" },
          },
        },
      },
      "/hashes/certificate-id": {
        post: {
          summary: "Derive a certificate ID",
          responses: {
            "200": { description: "Hash" },
          },
        },
      },
      "/hashes/redemption": {
        post: {
          summary: "Derive the hash a delegate signs for a single redemption",
          responses: {
            "200": { description: "Hash" },
          },
        },
      },
      "/hashes/condensed-ids": {
        post: {
          summary: "Digest an ordered list of certificate IDs",
          responses: {
            "200": { description: "Hash" },
          },
        },
      },
      "/hashes/condensed-redemption": {
        post: {
          summary: "Derive the hash a condenser signs",
          responses: {
            "200": { description: "Hash" },
          },
        },
      },
      "/events": {
        get: {
          summary: "List redemption events, optionally by certificateID or holder",
          responses: {
            "200": { description: "Events" },
          },
        },
      },
    },
  };
}
