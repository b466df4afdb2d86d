import {
  World,
  defineStep,
  setDefaultTimeout,
  setWorldConstructor,
  type IWorldOptions
} from "@cucumber/cucumber";
import { config } from "../../src/config.js";
import { createHarness, type Harness } from "../../src/harness.js";

export class VctWorld extends World {
  readonly harness: Harness;

  constructor(options: IWorldOptions) {
    super(options);
    this.harness = createHarness(config);
  }
}

setWorldConstructor(VctWorld);

// Worst case is a full polling budget plus one slow HTTP call.
setDefaultTimeout(
  config.VCT_POLL_MAX_ATTEMPTS * (config.VCT_POLL_INTERVAL_MS + config.VCT_HTTP_TIMEOUT_MS)
);

const captureCount = (pattern: RegExp) => (new RegExp(`${pattern.source}|`).exec("")?.length ?? 1) - 1;

const runDefinition = (world: VctWorld, source: string, args: string[]) => {
  const definition = world.harness.registry
    .definitions()
    .find((candidate) => candidate.pattern.source === source);
  if (!definition) {
    throw new Error(`step not registered in scenario harness: ${source}`);
  }
  return definition.handler(...args);
};

// Cucumber checks handler arity against the capture groups, so bind with an explicit signature.
// `this` is the scenario's world, which owns a fresh harness.
for (const { pattern } of createHarness(config).registry.definitions()) {
  const source = pattern.source;
  if (captureCount(pattern) === 0) {
    defineStep(pattern, async function (this: VctWorld) {
      await runDefinition(this, source, []);
    });
  } else {
    defineStep(pattern, async function (this: VctWorld, arg: string) {
      await runDefinition(this, source, [arg]);
    });
  }
}
