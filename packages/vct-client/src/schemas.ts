import { z } from "zod";

// Wire shapes follow the RFC 6962 JSON API; mapped to camelCase for callers.

export const SignedTreeHeadSchema = z
  .object({
    tree_size: z.number().int().min(0),
    timestamp: z.number().int().min(0),
    sha256_root_hash: z.string(),
    tree_head_signature: z.string()
  })
  .transform((value) => ({
    treeSize: value.tree_size,
    timestamp: value.timestamp,
    rootHash: value.sha256_root_hash,
    signature: value.tree_head_signature
  }));

export type SignedTreeHead = z.infer<typeof SignedTreeHeadSchema>;

export const AddVCResponseSchema = z
  .object({
    svct_version: z.number().int().optional(),
    id: z.string(),
    timestamp: z.number().int(),
    extensions: z.string().default(""),
    signature: z.string()
  })
  .transform((value) => ({
    svctVersion: value.svct_version ?? 0,
    id: value.id,
    timestamp: value.timestamp,
    extensions: value.extensions,
    signature: value.signature
  }));

export type AddVCResponse = z.infer<typeof AddVCResponseSchema>;

export const ConsistencyProofSchema = z.object({
  consistency: z.array(z.string()).nullish().transform((value) => value ?? [])
});

export type ConsistencyProof = z.infer<typeof ConsistencyProofSchema>;

const LeafEntrySchema = z
  .object({
    leaf_input: z.string(),
    extra_data: z.string().default("")
  })
  .transform((value) => ({
    leafInput: Buffer.from(value.leaf_input, "base64"),
    extraData: Buffer.from(value.extra_data, "base64")
  }));

export type LeafEntry = z.infer<typeof LeafEntrySchema>;

export const EntriesSchema = z.object({
  entries: z.array(LeafEntrySchema).nullish().transform((value) => value ?? [])
});

export type Entries = z.infer<typeof EntriesSchema>;

export const AuditProofSchema = z
  .object({
    leaf_index: z.number().int().min(0),
    audit_path: z.array(z.string()).nullish()
  })
  .transform((value) => ({
    leafIndex: value.leaf_index,
    auditPath: value.audit_path ?? []
  }));

export type AuditProof = z.infer<typeof AuditProofSchema>;

export const IssuersSchema = z.array(z.string()).nullish().transform((value) => value ?? []);

export const EntryAndProofSchema = z
  .object({
    leaf_input: z.string(),
    extra_data: z.string().default(""),
    audit_path: z.array(z.string()).nullish()
  })
  .transform((value) => ({
    leafInput: Buffer.from(value.leaf_input, "base64"),
    extraData: Buffer.from(value.extra_data, "base64"),
    auditPath: value.audit_path ?? []
  }));

export type EntryAndProof = z.infer<typeof EntryAndProofSchema>;
