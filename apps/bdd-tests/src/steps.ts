import {
  createVctClient,
  hashLeafBase64,
  rfc6962Hasher,
  type Hasher,
  type LeafEntry,
  type SignedTreeHead,
  type VctClient,
  type VctClientOptions
} from "@vctlog/client";
import { HarnessError } from "./errors.js";
import type { FixtureRegistry } from "./fixtures.js";
import { log } from "./log.js";
import { pollUntil, type PollOptions } from "./poll.js";
import type { StepRegistry } from "./stepRegistry.js";

export type HarnessState = {
  lastSignedTreeHead?: SignedTreeHead;
  lastEntries?: LeafEntry[];
};

export type LogStepsOptions = {
  fixtures: FixtureRegistry;
  poll: PollOptions;
  hasher?: Hasher;
  client?: VctClientOptions;
  createClient?: (endpoint: string, options: VctClientOptions) => VctClient;
  // Substitutes `${NAME}` placeholders in step arguments, e.g. `${VCT_URL}`.
  variables?: Record<string, string>;
};

export type LogSteps = {
  readonly state: Readonly<HarnessState>;
  connect(endpoint: string): Promise<void>;
  addVC(file: string): Promise<void>;
  checkTreeGrowth(expectedDelta: string): Promise<void>;
  checkConsistencyProof(): Promise<void>;
  checkEntries(expectedCount: string): Promise<void>;
  checkAuditProof(index: string): Promise<void>;
  registerSteps(registry: StepRegistry): void;
};

const CANONICAL_COUNT = /^(0|[1-9]\d*)$/;

const parseCount = (label: string, value: string) => {
  if (!CANONICAL_COUNT.test(value)) {
    throw new HarnessError(
      "invalid_argument",
      `${label} must be a non-negative decimal integer, got "${value}"`
    );
  }
  return Number(value);
};

const expand = (value: string, variables: Record<string, string>) =>
  value.replace(/\$\{([A-Z0-9_]+)\}/g, (match, name: string) => variables[name] ?? match);

export const createLogSteps = (options: LogStepsOptions): LogSteps => {
  const hasher = options.hasher ?? rfc6962Hasher;
  const createClient = options.createClient ?? createVctClient;
  const variables = options.variables ?? {};
  const state: HarnessState = {};
  let client: VctClient | undefined;

  const connected = () => {
    const baseline = state.lastSignedTreeHead;
    if (!client || !baseline) {
      throw new HarnessError("not_connected", "no VCT agent connected; run the connect step first");
    }
    return { client, baseline };
  };

  const steps: LogSteps = {
    get state() {
      return state;
    },

    async connect(endpoint) {
      const url = expand(endpoint, variables);
      const next = createClient(url, { ...options.client });
      const sth = await next.getSTH();
      client = next;
      state.lastSignedTreeHead = sth;
      log.info("harness.connected", { endpoint: next.endpoint, treeSize: sth.treeSize });
    },

    async addVC(file) {
      const { client: vct } = connected();
      const credential = options.fixtures.read(file);
      const receipt = await vct.addVC(credential);
      log.info("harness.vc_added", { file, id: receipt.id, timestamp: receipt.timestamp });
    },

    async checkTreeGrowth(expectedDelta) {
      parseCount("expected tree size", expectedDelta);
      const { client: vct, baseline } = connected();
      await pollUntil(
        "check tree growth",
        async () => {
          const sth = await vct.getSTH();
          const delta = String(sth.treeSize - baseline.treeSize);
          if (delta !== expectedDelta) {
            throw new HarnessError(
              "tree_size_mismatch",
              `expected tree size ${expectedDelta}, got ${delta}`
            );
          }
        },
        options.poll
      );
      log.info("harness.step_passed", { step: "tree_growth", delta: expectedDelta });
    },

    async checkConsistencyProof() {
      const { client: vct, baseline } = connected();
      await pollUntil(
        "check consistency proof",
        async () => {
          const sth = await vct.getSTH();
          const { consistency } = await vct.getSTHConsistency(baseline.treeSize, sth.treeSize);
          if (baseline.treeSize !== 0 && consistency.length < 1) {
            throw new HarnessError(
              "consistency_proof_invalid",
              `no hash, expected greater than zero, got ${consistency.length}`
            );
          }
          if (baseline.treeSize === 0 && consistency.length !== 0) {
            throw new HarnessError(
              "consistency_proof_invalid",
              `empty hash expected, got ${consistency.length}`
            );
          }
        },
        options.poll
      );
      log.info("harness.step_passed", { step: "consistency_proof", first: baseline.treeSize });
    },

    async checkEntries(expectedCount) {
      parseCount("expected entries length", expectedCount);
      const { client: vct, baseline } = connected();
      const entries = await pollUntil(
        "check entries",
        async () => {
          const sth = await vct.getSTH();
          const result = await vct.getEntries(baseline.treeSize, sth.treeSize);
          const length = String(result.entries.length);
          if (length !== expectedCount) {
            throw new HarnessError(
              "entry_count_mismatch",
              `no entries, expected ${expectedCount}, got ${length}`
            );
          }
          return result.entries;
        },
        options.poll
      );
      state.lastEntries = entries;
      log.info("harness.step_passed", { step: "entries", count: entries.length });
    },

    async checkAuditProof(index) {
      if (!/^\d+$/.test(index)) {
        throw new HarnessError("invalid_argument", `parse index: "${index}" is not an integer`);
      }
      const position = Number(index);
      const { client: vct } = connected();
      const entries = state.lastEntries;
      if (!entries) {
        throw new HarnessError(
          "entries_not_loaded",
          "no entries loaded; retrieve entries before requesting an audit proof"
        );
      }
      const entry = position >= 1 ? entries[position - 1] : undefined;
      if (!entry) {
        throw new HarnessError(
          "index_out_of_range",
          `entry ${index} out of range, ${entries.length} entries loaded`
        );
      }
      const leafHash = hashLeafBase64(entry.leafInput, hasher);
      await pollUntil(
        "check audit proof",
        async () => {
          const sth = await vct.getSTH();
          const proof = await vct.getProofByHash(leafHash, sth.treeSize);
          if (proof.auditPath.length < 1) {
            throw new HarnessError(
              "audit_proof_empty",
              `no audit, expected greater than zero, got ${proof.auditPath.length}`
            );
          }
        },
        options.poll
      );
      log.info("harness.step_passed", { step: "audit_proof", index: position });
    },

    registerSteps(registry) {
      registry.register(/^VCT agent is running on "([^"]*)"$/, (endpoint) => steps.connect(endpoint));
      registry.register(/^Add verifiable credential "([^"]*)" to Log$/, (file) => steps.addVC(file));
      registry.register(
        /^Retrieve latest signed tree head and check that tree_size is "([^"]*)"$/,
        (treeSize) => steps.checkTreeGrowth(treeSize)
      );
      registry.register(/^Retrieve merkle consistency proof between signed tree heads$/, () =>
        steps.checkConsistencyProof()
      );
      registry.register(/^Retrieve entries from log and check that len is "([^"]*)"$/, (lengths) =>
        steps.checkEntries(lengths)
      );
      registry.register(
        /^Retrieve merkle audit proof from log by leaf hash for entry "([^"]*)"$/,
        (idx) => steps.checkAuditProof(idx)
      );
    }
  };

  return steps;
};
