export { createVctClient, DEFAULT_TIMEOUT_MS } from "./client.js";
export type { VctClient, VctClientOptions } from "./client.js";
export { VctClientError } from "./errors.js";
export type { VctClientErrorCode } from "./errors.js";
export { rfc6962Hasher, hashLeafBase64 } from "./hasher.js";
export type { Hasher } from "./hasher.js";
export type {
  AddVCResponse,
  AuditProof,
  ConsistencyProof,
  Entries,
  EntryAndProof,
  LeafEntry,
  SignedTreeHead
} from "./schemas.js";
