import { readFileSync, readdirSync } from "node:fs";
import path from "node:path";
import { HarnessError } from "./errors.js";

export type FixtureRegistry = {
  readonly dir: string;
  list(): string[];
  read(name: string): Uint8Array;
};

const FIXTURE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*\.json$/;

// Loaded once; later reads serve copies so callers cannot mutate the registry.
export const createFixtureRegistry = (dir: string): FixtureRegistry => {
  const files = new Map<string, Buffer>();
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (entry.isFile() && FIXTURE_NAME.test(entry.name)) {
      files.set(entry.name, readFileSync(path.join(dir, entry.name)));
    }
  }
  return {
    dir,
    list: () => [...files.keys()].sort(),
    read: (name) => {
      const content = FIXTURE_NAME.test(name) ? files.get(name) : undefined;
      if (!content) {
        throw new HarnessError("fixture_not_found", `fixture "${name}" not found in ${dir}`);
      }
      return Uint8Array.from(content);
    }
  };
};
