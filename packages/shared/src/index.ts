export * from "./crypto/canonical.js";
export * from "./crypto/hash.js";
export * from "./crypto/ed25519.js";
export * from "./auth/service-auth.js";
export * from "./types/ledger.js";
export * from "./types/chain.js";
export * from "./types/api.js";
