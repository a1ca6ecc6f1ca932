export * from "./errors.js";
export * from "./crypto/digest.js";
export * from "./crypto/identity.js";
export * from "./crypto/signature.js";
export * from "./auth/admin.js";
export * from "./auth/service-auth.js";
export * from "./types/certificate.js";
export * from "./types/events.js";
export * from "./types/api.js";
