import { test } from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import { createVctClient, hashLeafBase64, rfc6962Hasher } from "@vctlog/client";
import { createFixtureRegistry } from "./fixtures.js";
import { startFakeLog } from "./testUtils/fakeLog.js";

const fixtures = createFixtureRegistry(fileURLToPath(new URL("../testdata", import.meta.url)));

// Inclusion check from RFC 9162 section 2.1.3.2.
const rootFromAuditPath = (leafIndex: number, treeSize: number, leaf: Uint8Array, path: string[]) => {
  let fn = leafIndex;
  let sn = treeSize - 1;
  let r = rfc6962Hasher.hashLeaf(leaf);
  for (const encoded of path) {
    const p = Buffer.from(encoded, "base64");
    assert.notEqual(sn, 0, "audit path longer than the tree allows");
    if (fn % 2 === 1 || fn === sn) {
      r = rfc6962Hasher.hashChildren(p, r);
      while (fn % 2 === 0 && fn !== 0) {
        fn = Math.floor(fn / 2);
        sn = Math.floor(sn / 2);
      }
    } else {
      r = rfc6962Hasher.hashChildren(r, p);
    }
    fn = Math.floor(fn / 2);
    sn = Math.floor(sn / 2);
  }
  assert.equal(sn, 0, "audit path shorter than the tree requires");
  return Buffer.from(r).toString("base64");
};

test("log client read surface returns proofs that recompute the signed root", async () => {
  const fake = await startFakeLog();
  try {
    const client = createVctClient(fake.url);
    const names = fixtures.list();
    for (const name of names) {
      await client.addVC(fixtures.read(name));
    }
    const sth = await client.getSTH();
    assert.equal(sth.treeSize, 3);

    for (const [index, name] of names.entries()) {
      const credential = fixtures.read(name);
      const entry = await client.getEntryAndProof(index, sth.treeSize);
      assert.deepEqual(Uint8Array.from(entry.leafInput), credential);
      assert.equal(
        rootFromAuditPath(index, sth.treeSize, credential, entry.auditPath),
        sth.rootHash
      );

      const byHash = await client.getProofByHash(hashLeafBase64(credential), sth.treeSize);
      assert.equal(byHash.leafIndex, index);
      assert.deepEqual(byHash.auditPath, entry.auditPath);
    }

    assert.deepEqual(await client.getIssuers(), ["did:example:issuer"]);
  } finally {
    await fake.close();
  }
});
