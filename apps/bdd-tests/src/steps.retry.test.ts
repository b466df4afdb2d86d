import { test } from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import { HarnessError } from "./errors.js";
import { createFixtureRegistry } from "./fixtures.js";
import { createLogSteps } from "./steps.js";
import { startFakeLog } from "./testUtils/fakeLog.js";

const fixtures = createFixtureRegistry(fileURLToPath(new URL("../testdata", import.meta.url)));

const recordingSteps = (maxAttempts = 15) => {
  const sleeps: number[] = [];
  const steps = createLogSteps({
    fixtures,
    poll: {
      intervalMs: 1000,
      maxAttempts,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    }
  });
  return { steps, sleeps };
};

const sthReads = (requests: readonly string[]) =>
  requests.filter((url) => url === "/v1/get-sth").length;

test("tree growth waits for the log to merge pending entries", async () => {
  const fake = await startFakeLog({ mergeAfterReads: 2 });
  try {
    const { steps, sleeps } = recordingSteps();
    await steps.connect(fake.url);
    await steps.addVC("bachelor_degree_1.json");
    assert.equal(fake.pending(), 1);

    await steps.checkTreeGrowth("1");
    assert.deepEqual(sleeps, [1000, 1000]);
    assert.equal(sthReads(fake.requests), 1 + 3);
    assert.equal(fake.pending(), 0);
  } finally {
    await fake.close();
  }
});

test("entries check retries while the range is not yet available", async () => {
  const fake = await startFakeLog({ mergeAfterReads: 1 });
  try {
    const { steps, sleeps } = recordingSteps();
    await steps.connect(fake.url);
    await steps.addVC("bachelor_degree_1.json");
    await steps.checkEntries("1");
    assert.deepEqual(sleeps, [1000]);
    assert.equal(steps.state.lastEntries?.length, 1);
  } finally {
    await fake.close();
  }
});

test("a log that never advances exhausts exactly 15 attempts", async () => {
  const fake = await startFakeLog();
  try {
    const { steps, sleeps } = recordingSteps();
    await steps.connect(fake.url);
    await assert.rejects(steps.checkTreeGrowth("1"), (error: unknown) => {
      assert.ok(error instanceof HarnessError);
      assert.equal(error.code, "retry_exhausted");
      assert.match(
        error.message,
        /^check tree growth: gave up after 15 attempts in \d+ms: expected tree size 1, got 0$/
      );
      return true;
    });
    assert.equal(sthReads(fake.requests), 1 + 15);
    assert.equal(sleeps.length, 14);
    assert.ok(sleeps.every((ms) => ms === 1000));
  } finally {
    await fake.close();
  }
});

test("consistency proof against a non-empty baseline needs growth", async () => {
  const fake = await startFakeLog();
  try {
    const seed = recordingSteps();
    await seed.steps.connect(fake.url);
    await seed.steps.addVC("bachelor_degree_1.json");

    const { steps, sleeps } = recordingSteps(3);
    await steps.connect(fake.url);
    await assert.rejects(steps.checkConsistencyProof(), (error: unknown) => {
      assert.ok(error instanceof HarnessError);
      assert.match(error.message, /no hash, expected greater than zero, got 0$/);
      return true;
    });
    assert.deepEqual(sleeps, [1000, 1000]);

    await steps.addVC("bachelor_degree_2.json");
    await steps.checkConsistencyProof();
  } finally {
    await fake.close();
  }
});

test("audit proof exhausts when the log never returns a path", async () => {
  const fake = await startFakeLog({ auditPathOverride: [] });
  try {
    const { steps, sleeps } = recordingSteps(4);
    await steps.connect(fake.url);
    await steps.addVC("bachelor_degree_1.json");
    await steps.addVC("bachelor_degree_2.json");
    await steps.checkEntries("2");
    await assert.rejects(steps.checkAuditProof("2"), { code: "retry_exhausted" });
    assert.deepEqual(sleeps, [1000, 1000, 1000]);
    assert.equal(
      fake.requests.filter((url) => url.startsWith("/v1/get-proof-by-hash")).length,
      4
    );
  } finally {
    await fake.close();
  }
});

test("audit proof retries until the log returns a path", async () => {
  const fake = await startFakeLog({ auditPathMissingFor: 2 });
  try {
    const { steps, sleeps } = recordingSteps();
    await steps.connect(fake.url);
    await steps.addVC("bachelor_degree_1.json");
    await steps.addVC("bachelor_degree_2.json");
    await steps.checkEntries("2");
    await steps.checkAuditProof("1");
    assert.deepEqual(sleeps, [1000, 1000]);
    assert.equal(
      fake.requests.filter((url) => url.startsWith("/v1/get-proof-by-hash")).length,
      3
    );
  } finally {
    await fake.close();
  }
});

test("consistency proof from an empty baseline must itself be empty", async () => {
  const fake = await startFakeLog({ consistencyOverride: ["YQ=="] });
  try {
    const { steps, sleeps } = recordingSteps(4);
    await steps.connect(fake.url);
    await assert.rejects(steps.checkConsistencyProof(), (error: unknown) => {
      assert.ok(error instanceof HarnessError);
      assert.equal(error.code, "retry_exhausted");
      assert.match(error.message, /empty hash expected, got 1$/);
      return true;
    });
    assert.equal(sleeps.length, 3);
  } finally {
    await fake.close();
  }
});
