import { HarnessError, describeError } from "./errors.js";
import { log } from "./log.js";

export type StepHandler = (...args: string[]) => Promise<void>;

export type StepDefinition = {
  pattern: RegExp;
  handler: StepHandler;
};

export type StepRegistry = {
  register(pattern: RegExp, handler: StepHandler): void;
  definitions(): readonly StepDefinition[];
  dispatch(text: string): Promise<void>;
};

export const createStepRegistry = (): StepRegistry => {
  const definitions: StepDefinition[] = [];

  const match = (text: string) => {
    const hits = definitions
      .map((definition) => ({ definition, result: definition.pattern.exec(text) }))
      .filter((hit): hit is { definition: StepDefinition; result: RegExpExecArray } =>
        Boolean(hit.result)
      );
    if (hits.length === 0) {
      throw new HarnessError("undefined_step", `no step matches "${text}"`);
    }
    if (hits.length > 1) {
      throw new HarnessError(
        "ambiguous_step",
        `"${text}" matches ${hits.length} steps: ${hits
          .map((hit) => hit.definition.pattern.source)
          .join(", ")}`
      );
    }
    const [hit] = hits;
    return { handler: hit.definition.handler, args: hit.result.slice(1).map((arg) => arg ?? "") };
  };

  return {
    register(pattern, handler) {
      if (definitions.some((definition) => definition.pattern.source === pattern.source)) {
        throw new Error(`step already registered: ${pattern.source}`);
      }
      definitions.push({ pattern, handler });
    },
    definitions: () => definitions,
    async dispatch(text) {
      const { handler, args } = match(text.trim());
      await handler(...args);
    }
  };
};

export type ScenarioResult =
  | { ok: true; steps: number }
  | { ok: false; steps: number; failedStep: string; error: unknown };

const GHERKIN_KEYWORD = /^(Given|When|Then|And|But|\*)\s+/;

/** Strips comments, blank lines and Gherkin keywords from a plain step list. */
export const parseScenarioText = (text: string) =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"))
    .map((line) => line.replace(GHERKIN_KEYWORD, ""));

export const runScenario = async (
  registry: StepRegistry,
  lines: readonly string[]
): Promise<ScenarioResult> => {
  let completed = 0;
  for (const line of lines) {
    try {
      await registry.dispatch(line);
    } catch (error) {
      log.error("scenario.step_failed", { step: line, completed, error: describeError(error) });
      return { ok: false, steps: completed, failedStep: line, error };
    }
    completed += 1;
  }
  return { ok: true, steps: completed };
};
