import fastify from "fastify";
import { z } from "zod";
import { rfc6962Hasher } from "@vctlog/client";

type Leaf = { input: Buffer; hash: Uint8Array };

export type FakeLogOptions = {
  // Submitted credentials stay pending for this many get-sth reads after the last submission.
  mergeAfterReads?: number;
  // Replaces computed audit paths, to simulate a log that answers without proofs.
  auditPathOverride?: string[];
  // Answers get-proof-by-hash with an empty path this many times before computing real ones.
  auditPathMissingFor?: number;
  // Replaces computed consistency proofs.
  consistencyOverride?: string[];
};

export type FakeLog = {
  url: string;
  readonly requests: string[];
  size(): number;
  pending(): number;
  close(): Promise<void>;
};

const hasher = rfc6962Hasher;
const b64 = (bytes: Uint8Array) => Buffer.from(bytes).toString("base64");

const largestPowerOfTwoBelow = (n: number) => {
  let k = 1;
  while (k * 2 < n) k *= 2;
  return k;
};

const treeHash = (leaves: Leaf[]): Uint8Array => {
  if (leaves.length === 0) return hasher.emptyRoot();
  if (leaves.length === 1) return leaves[0].hash;
  const k = largestPowerOfTwoBelow(leaves.length);
  return hasher.hashChildren(treeHash(leaves.slice(0, k)), treeHash(leaves.slice(k)));
};

const auditPath = (index: number, leaves: Leaf[]): Uint8Array[] => {
  if (leaves.length <= 1) return [];
  const k = largestPowerOfTwoBelow(leaves.length);
  if (index < k) {
    return [...auditPath(index, leaves.slice(0, k)), treeHash(leaves.slice(k))];
  }
  return [...auditPath(index - k, leaves.slice(k)), treeHash(leaves.slice(0, k))];
};

const subProof = (m: number, leaves: Leaf[], complete: boolean): Uint8Array[] => {
  if (m === leaves.length) return complete ? [] : [treeHash(leaves)];
  const k = largestPowerOfTwoBelow(leaves.length);
  if (m <= k) {
    return [...subProof(m, leaves.slice(0, k), complete), treeHash(leaves.slice(k))];
  }
  return [...subProof(m - k, leaves.slice(k), false), treeHash(leaves.slice(0, k))];
};

const consistencyProof = (first: number, leaves: Leaf[]) =>
  first === 0 ? [] : subProof(first, leaves, true);

const intParam = z.coerce.number().int().min(0);

/** In-process stand-in for a VCT log speaking the RFC 6962 JSON API. */
export const startFakeLog = async (options: FakeLogOptions = {}): Promise<FakeLog> => {
  const merged: Leaf[] = [];
  const queued: Leaf[] = [];
  const requests: string[] = [];
  let readsSinceAdd = 0;
  let proofsServed = 0;

  const app = fastify({ logger: false });
  app.addContentTypeParser("application/json", { parseAs: "buffer" }, (_request, body, done) => {
    done(null, body);
  });
  app.addHook("onRequest", async (request) => {
    requests.push(request.url);
  });

  app.get("/v1/get-sth", async () => {
    readsSinceAdd += 1;
    if (queued.length > 0 && readsSinceAdd > (options.mergeAfterReads ?? 0)) {
      merged.push(...queued.splice(0));
    }
    return {
      tree_size: merged.length,
      timestamp: 1_700_000_000_000 + merged.length,
      sha256_root_hash: b64(treeHash(merged)),
      tree_head_signature: Buffer.from("test-signature").toString("base64")
    };
  });

  app.post("/v1/add-vc", async (request, reply) => {
    const body = request.body;
    if (!Buffer.isBuffer(body)) {
      return reply.code(400).send({ message: "credential required" });
    }
    try {
      JSON.parse(body.toString("utf8"));
    } catch {
      return reply.code(400).send({ message: "credential is not JSON" });
    }
    const leaf = { input: body, hash: hasher.hashLeaf(body) };
    queued.push(leaf);
    readsSinceAdd = 0;
    if ((options.mergeAfterReads ?? 0) === 0) {
      merged.push(...queued.splice(0));
    }
    return {
      svct_version: 0,
      id: Buffer.from("fake-log").toString("base64"),
      timestamp: 1_700_000_000_000,
      extensions: "",
      signature: Buffer.from("test-signature").toString("base64")
    };
  });

  app.get("/v1/get-sth-consistency", async (request, reply) => {
    const query = z.object({ first: intParam, second: intParam }).safeParse(request.query);
    if (!query.success || query.data.first > query.data.second || query.data.second > merged.length) {
      return reply.code(400).send({ message: "invalid tree sizes" });
    }
    const proof = consistencyProof(query.data.first, merged.slice(0, query.data.second));
    return { consistency: options.consistencyOverride ?? proof.map(b64) };
  });

  app.get("/v1/get-entries", async (request, reply) => {
    const query = z.object({ start: intParam, end: intParam }).safeParse(request.query);
    if (!query.success || query.data.end < query.data.start) {
      return reply.code(400).send({ message: "invalid range" });
    }
    if (query.data.start >= merged.length) {
      return reply.code(400).send({ message: "start beyond tree size" });
    }
    const last = Math.min(query.data.end, merged.length - 1);
    return {
      entries: merged.slice(query.data.start, last + 1).map((leaf) => ({
        leaf_input: leaf.input.toString("base64"),
        extra_data: ""
      }))
    };
  });

  app.get("/v1/get-proof-by-hash", async (request, reply) => {
    const query = z
      .object({ hash: z.string().min(1), tree_size: intParam })
      .safeParse(request.query);
    if (!query.success || query.data.tree_size > merged.length) {
      return reply.code(400).send({ message: "invalid proof request" });
    }
    const leaves = merged.slice(0, query.data.tree_size);
    const index = leaves.findIndex((leaf) => b64(leaf.hash) === query.data.hash);
    if (index < 0) {
      return reply.code(404).send({ message: "leaf not found" });
    }
    proofsServed += 1;
    if (proofsServed <= (options.auditPathMissingFor ?? 0)) {
      return { leaf_index: index, audit_path: [] };
    }
    return {
      leaf_index: index,
      audit_path: options.auditPathOverride ?? auditPath(index, leaves).map(b64)
    };
  });

  app.get("/v1/get-entry-and-proof", async (request, reply) => {
    const query = z.object({ leaf_index: intParam, tree_size: intParam }).safeParse(request.query);
    if (
      !query.success ||
      query.data.tree_size > merged.length ||
      query.data.leaf_index >= query.data.tree_size
    ) {
      return reply.code(400).send({ message: "invalid entry request" });
    }
    const leaves = merged.slice(0, query.data.tree_size);
    const leaf = leaves[query.data.leaf_index];
    return {
      leaf_input: leaf.input.toString("base64"),
      extra_data: "",
      audit_path: auditPath(query.data.leaf_index, leaves).map(b64)
    };
  });

  app.get("/v1/get-issuers", async () => ["did:example:issuer"]);

  const url = await app.listen({ port: 0, host: "127.0.0.1" });
  return {
    url,
    requests,
    size: () => merged.length,
    pending: () => queued.length,
    close: () => app.close()
  };
};
