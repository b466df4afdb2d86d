import type { Config } from "./config.js";
import { createFixtureRegistry, type FixtureRegistry } from "./fixtures.js";
import { createStepRegistry, type StepRegistry } from "./stepRegistry.js";
import { createLogSteps, type LogSteps } from "./steps.js";

export type Harness = {
  fixtures: FixtureRegistry;
  steps: LogSteps;
  registry: StepRegistry;
};

let sharedFixtures: FixtureRegistry | undefined;

const fixturesFor = (dir: string) => {
  if (!sharedFixtures || sharedFixtures.dir !== dir) {
    sharedFixtures = createFixtureRegistry(dir);
  }
  return sharedFixtures;
};

// One harness per scenario: state starts empty and is dropped with the harness.
export const createHarness = (config: Config): Harness => {
  const fixtures = fixturesFor(config.FIXTURES_DIR);
  const steps = createLogSteps({
    fixtures,
    poll: { intervalMs: config.VCT_POLL_INTERVAL_MS, maxAttempts: config.VCT_POLL_MAX_ATTEMPTS },
    client: { timeoutMs: config.VCT_HTTP_TIMEOUT_MS },
    variables: { VCT_URL: config.VCT_URL }
  });
  const registry = createStepRegistry();
  steps.registerSteps(registry);
  return { fixtures, steps, registry };
};
