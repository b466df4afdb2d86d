import type { z } from "zod";
import { VctClientError } from "./errors.js";
import {
  AddVCResponseSchema,
  AuditProofSchema,
  ConsistencyProofSchema,
  EntriesSchema,
  EntryAndProofSchema,
  IssuersSchema,
  SignedTreeHeadSchema,
  type AddVCResponse,
  type AuditProof,
  type ConsistencyProof,
  type Entries,
  type EntryAndProof,
  type SignedTreeHead
} from "./schemas.js";

export const DEFAULT_TIMEOUT_MS = 60_000;

export type VctClientOptions = {
  timeoutMs?: number;
  fetch?: typeof fetch;
  headers?: Record<string, string>;
};

export type VctClient = {
  readonly endpoint: string;
  getSTH(): Promise<SignedTreeHead>;
  addVC(credential: Uint8Array): Promise<AddVCResponse>;
  getSTHConsistency(first: number, second: number): Promise<ConsistencyProof>;
  getEntries(start: number, end: number): Promise<Entries>;
  getProofByHash(hashB64: string, treeSize: number): Promise<AuditProof>;
  getIssuers(): Promise<string[]>;
  getEntryAndProof(leafIndex: number, treeSize: number): Promise<EntryAndProof>;
};

const normalizeEndpoint = (input: string) => {
  const base = new URL(input);
  const path = base.pathname.endsWith("/") ? base.pathname.slice(0, -1) : base.pathname;
  base.pathname = `${path}/`;
  return base.toString();
};

export const createVctClient = (endpoint: string, options: VctClientOptions = {}): VctClient => {
  const baseUrl = normalizeEndpoint(endpoint);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const doFetch = options.fetch ?? globalThis.fetch;

  const request = async <S extends z.ZodTypeAny>(
    route: string,
    schema: S,
    init: { method: "GET" | "POST"; query?: Record<string, string | number>; body?: Uint8Array }
  ): Promise<z.output<S>> => {
    const url = new URL(`v1/${route}`, baseUrl);
    for (const [key, value] of Object.entries(init.query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort("vct_timeout"), timeoutMs);
    timeout.unref?.();
    let response: Response;
    let text: string;
    try {
      response = await doFetch(url, {
        method: init.method,
        headers: {
          accept: "application/json",
          ...(init.body ? { "content-type": "application/json" } : {}),
          ...options.headers
        },
        body: init.body,
        signal: controller.signal
      });
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new VctClientError("timeout", `${init.method} ${route} timed out after ${timeoutMs}ms`, {
          cause: error
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new VctClientError("network_error", `${init.method} ${route}: ${reason}`, {
        cause: error
      });
    } finally {
      clearTimeout(timeout);
    }
    if (!response.ok) {
      throw new VctClientError("http_error", `${init.method} ${route}: HTTP ${response.status}: ${text}`, {
        status: response.status,
        body: text
      });
    }
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new VctClientError("invalid_response", `${init.method} ${route}: body is not JSON`, {
        status: response.status,
        body: text,
        cause: error
      });
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new VctClientError(
        "invalid_response",
        `${init.method} ${route}: unexpected response shape: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
          .join("; ")}`,
        { status: response.status, body: text }
      );
    }
    return parsed.data;
  };

  return {
    endpoint: baseUrl,
    async getSTH() {
      return request("get-sth", SignedTreeHeadSchema, { method: "GET" });
    },
    async addVC(credential) {
      return request("add-vc", AddVCResponseSchema, { method: "POST", body: credential });
    },
    async getSTHConsistency(first, second) {
      return request("get-sth-consistency", ConsistencyProofSchema, {
        method: "GET",
        query: { first, second }
      });
    },
    async getEntries(start, end) {
      return request("get-entries", EntriesSchema, { method: "GET", query: { start, end } });
    },
    async getProofByHash(hashB64, treeSize) {
      return request("get-proof-by-hash", AuditProofSchema, {
        method: "GET",
        query: { hash: hashB64, tree_size: treeSize }
      });
    },
    async getIssuers() {
      return request("get-issuers", IssuersSchema, { method: "GET" });
    },
    async getEntryAndProof(leafIndex, treeSize) {
      return request("get-entry-and-proof", EntryAndProofSchema, {
        method: "GET",
        query: { leaf_index: leafIndex, tree_size: treeSize }
      });
    }
  };
};
