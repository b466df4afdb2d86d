import { test } from "node:test";
import assert from "node:assert/strict";
import { createStepRegistry, parseScenarioText } from "./stepRegistry.js";

test("dispatch passes captured strings to the bound handler", async () => {
  const registry = createStepRegistry();
  const calls: string[][] = [];
  registry.register(/^Add verifiable credential "([^"]*)" to Log$/, async (...args) => {
    calls.push(args);
  });
  await registry.dispatch('  Add verifiable credential "vc.json" to Log ');
  assert.deepEqual(calls, [["vc.json"]]);
});

test("dispatch rejects unknown and ambiguous step text", async () => {
  const registry = createStepRegistry();
  registry.register(/^Retrieve (.*)$/, async () => undefined);
  registry.register(/^Retrieve entries$/, async () => undefined);
  await assert.rejects(registry.dispatch("Submit something"), {
    code: "undefined_step",
    message: 'no step matches "Submit something"'
  });
  await assert.rejects(registry.dispatch("Retrieve entries"), { code: "ambiguous_step" });
});

test("a pattern can only be registered once", () => {
  const registry = createStepRegistry();
  registry.register(/^noop$/, async () => undefined);
  assert.throws(() => registry.register(/^noop$/, async () => undefined), /already registered/);
});

test("parseScenarioText strips comments, blanks and keywords", () => {
  assert.deepEqual(
    parseScenarioText(
      '# comment\n\nGiven VCT agent is running on "http://vct.test"\r\n  And Retrieve entries\n* Done\nplain'
    ),
    ['VCT agent is running on "http://vct.test"', "Retrieve entries", "Done", "plain"]
  );
});
