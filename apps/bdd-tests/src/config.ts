import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const appRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

dotenv.config({
  path: path.resolve(appRoot, "../../.env")
});

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const clampNumber = (fallback: number, min: number, max: number) => (value: unknown) => {
  const parsed = toNumber(fallback)(value);
  return Math.max(min, Math.min(max, parsed));
};

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  VCT_URL: z.string().url().default("http://localhost:56565"),
  VCT_HTTP_TIMEOUT_MS: z.preprocess(
    clampNumber(60_000, 1000, 300_000),
    z.number().int().min(1000).max(300_000)
  ),
  VCT_POLL_INTERVAL_MS: z.preprocess(
    clampNumber(1000, 10, 60_000),
    z.number().int().min(10).max(60_000)
  ),
  VCT_POLL_MAX_ATTEMPTS: z.preprocess(clampNumber(15, 1, 100), z.number().int().min(1).max(100)),
  VCT_FIXTURES_DIR: z.preprocess(emptyToUndefined, z.string().optional())
});

export type Config = z.infer<typeof envSchema> & { FIXTURES_DIR: string };

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const parsed = envSchema.parse(env);
  return {
    ...parsed,
    FIXTURES_DIR: parsed.VCT_FIXTURES_DIR
      ? path.resolve(parsed.VCT_FIXTURES_DIR)
      : path.join(appRoot, "testdata")
  };
};

export const config = loadConfig();
