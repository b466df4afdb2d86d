import { createHash } from "node:crypto";

export type Hasher = {
  hashLeaf(leaf: Uint8Array): Uint8Array;
  hashChildren(left: Uint8Array, right: Uint8Array): Uint8Array;
  emptyRoot(): Uint8Array;
};

// RFC 6962 domain separation prefixes.
const LEAF_PREFIX = 0x00;
const NODE_PREFIX = 0x01;

const sha256 = (...parts: Uint8Array[]) => {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(part);
  }
  return new Uint8Array(hash.digest());
};

export const rfc6962Hasher: Hasher = {
  hashLeaf: (leaf) => sha256(Uint8Array.of(LEAF_PREFIX), leaf),
  hashChildren: (left, right) => sha256(Uint8Array.of(NODE_PREFIX), left, right),
  emptyRoot: () => sha256()
};

export const hashLeafBase64 = (leaf: Uint8Array, hasher: Hasher = rfc6962Hasher) =>
  Buffer.from(hasher.hashLeaf(leaf)).toString("base64");
