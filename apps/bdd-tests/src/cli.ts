import { readFile } from "node:fs/promises";
import { config } from "./config.js";
import { describeError } from "./errors.js";
import { createHarness } from "./harness.js";
import { log } from "./log.js";
import { parseScenarioText, runScenario } from "./stepRegistry.js";

const usage = "usage: cli.ts scenario <file> | cli.ts fixtures";

const run = async () => {
  const [command, file] = process.argv.slice(2);
  if (command === "fixtures") {
    const { fixtures } = createHarness(config);
    for (const name of fixtures.list()) {
      console.log(name);
    }
    return;
  }
  if (command !== "scenario" || !file) {
    console.error(usage);
    process.exitCode = 1;
    return;
  }
  const text = await readFile(file, "utf8");
  const { registry } = createHarness(config);
  const result = await runScenario(registry, parseScenarioText(text));
  if (!result.ok) {
    log.error("scenario.failed", {
      file,
      failedStep: result.failedStep,
      completed: result.steps,
      error: describeError(result.error)
    });
    process.exitCode = 1;
    return;
  }
  log.info("scenario.passed", { file, steps: result.steps });
};

run().catch((error) => {
  console.error(describeError(error));
  process.exit(1);
});
