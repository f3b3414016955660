// Unique symbol used as the transaction origin for our own Yjs writes
export const ENHANCED_ACCESS_ORIGIN: unique symbol = Symbol(
  "enhanced-access-origin",
);

// Shared prefix for all debug logs
export const LOG_PREFIX = "[enhanced-access]";

// Brand carried by every accessor so the path driver can tell it from a bare key
export const ACCESSOR_BRAND: unique symbol = Symbol("enhanced-access/accessor");
