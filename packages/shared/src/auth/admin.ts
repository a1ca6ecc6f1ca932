import { RedemptionError } from "../errors.js";

export const ADMIN_ROLE_HEADER = "x-governance-role";
export const ADMIN_ACTOR_HEADER = "x-governance-actor";
export const DEFAULT_ADMIN_ROLES = ["issuer_admin"];

export type AdminRoleSet = Set<string>;

export interface AdminCaller {
  role: string | null;
  actor: string | null;
}

function normalizeToken(value: string): string {
  return value.trim().toLowerCase();
}

function firstHeaderValue(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? first : null;
  }
  return null;
}

export function parseAdminRoleHeader(value: unknown): string | null {
  const raw = firstHeaderValue(value);
  if (raw === null) return null;
  const normalized = normalizeToken(raw);
  return normalized.length > 0 ? normalized : null;
}

export function parseAdminActorHeader(value: unknown): string | null {
  const raw = firstHeaderValue(value);
  if (raw === null) return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function readAdminCaller(headers: Record<string, unknown>): AdminCaller {
  return {
    role: parseAdminRoleHeader(headers[ADMIN_ROLE_HEADER]),
    actor: parseAdminActorHeader(headers[ADMIN_ACTOR_HEADER]),
  };
}

/** `*` admits every caller; an empty or missing list falls back to `fallbackRoles`. */
export function parseAdminRoleSet(
  raw: string | undefined,
  fallbackRoles: string[] = DEFAULT_ADMIN_ROLES,
): AdminRoleSet {
  const source = (raw || "").trim();
  if (!source) {
    return new Set(fallbackRoles.map(normalizeToken));
  }

  if (source === "*") {
    return new Set(["*"]);
  }

  return new Set(
    source
      .split(",")
      .map(normalizeToken)
      .filter((role) => role.length > 0),
  );
}

export function isAdminRoleAllowed(role: string | null, allowedRoles: AdminRoleSet): boolean {
  if (allowedRoles.has("*")) return true;
  if (!role) return false;
  return allowedRoles.has(role);
}

export function requireAdmin(caller: AdminCaller, allowedRoles: AdminRoleSet): void {
  if (isAdminRoleAllowed(caller.role, allowedRoles)) return;
  throw new RedemptionError(
    "ADMIN_REQUIRED",
    `'${ADMIN_ROLE_HEADER}' must name one of: ${[...allowedRoles].join(", ")}`,
  );
}
