import assert from "node:assert/strict";
import test from "node:test";
import { getAddress } from "ethers";
import {
  isAdminRoleAllowed,
  isRedemptionError,
  isServiceAuthAuthorized,
  parseAdminRoleSet,
  parseCallerAddressHeader,
  readAdminCaller,
  requireAdmin,
} from "../index.js";

test("admin role set falls back to issuer_admin", () => {
  assert.deepEqual([...parseAdminRoleSet(undefined)], ["issuer_admin"]);
  assert.deepEqual([...parseAdminRoleSet(" Ops_Admin, issuer_admin ,")], ["ops_admin", "issuer_admin"]);
  assert.equal(isAdminRoleAllowed(null, parseAdminRoleSet("*")), true);
});

test("reads governance headers into an admin caller", () => {
  const caller = readAdminCaller({
    "x-governance-role": ["  ISSUER_ADMIN "],
    "x-governance-actor": " ops-1 ",
  });
  assert.deepEqual(caller, { role: "issuer_admin", actor: "ops-1" });
  assert.deepEqual(readAdminCaller({}), { role: null, actor: null });
});

test("requireAdmin rejects callers outside the allowed roles", () => {
  const roles = parseAdminRoleSet("issuer_admin");
  requireAdmin({ role: "issuer_admin", actor: null }, roles);
  assert.throws(
    () => requireAdmin({ role: "viewer", actor: "v-1" }, roles),
    (err) => isRedemptionError(err, "ADMIN_REQUIRED"),
  );
  assert.throws(
    () => requireAdmin({ role: null, actor: null }, roles),
    (err) => isRedemptionError(err, "ADMIN_REQUIRED"),
  );
});

test("service token check is open when no token is configured", () => {
  assert.equal(isServiceAuthAuthorized(undefined, undefined), true);
  assert.equal(isServiceAuthAuthorized("svc-secret", "svc-secret"), true);
  assert.equal(isServiceAuthAuthorized(["other", "svc-secret"], "svc-secret"), true);
  assert.equal(isServiceAuthAuthorized("wrong", "svc-secret"), false);
});

test("caller address header is checksummed or rejected", () => {
  const holder = "0x000000000000000000000000000000000000000a";
  assert.equal(parseCallerAddressHeader(` ${holder} `), getAddress(holder));
  assert.equal(parseCallerAddressHeader([holder]), getAddress(holder));
  assert.equal(parseCallerAddressHeader("holder-1"), null);
  assert.equal(parseCallerAddressHeader(undefined), null);
});
