/**
 * Pipeline configuration from environment variables.
 */

import { z } from "zod";
import { ConfigError } from "./errors";

export const envSchema = z.object({
  GOOGLE_MAPS_API_KEY: z.string().trim().min(1, "GOOGLE_MAPS_API_KEY is required"),
  THROTTLE_THRESHOLD: z.coerce.number().int().nonnegative().default(100),
  CHECKPOINT_PATH: z.string().default("data/enriched_courses.csv"),
  INPUT_CSV: z.string().default("data/golf_courses.csv"),
  OUTPUT_DIR: z.string().default("output"),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type PipelineConfig = {
  apiKey: string;
  throttleThreshold: number;
  checkpointPath: string;
  inputCsv: string;
  outputDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`, { problems });
  }

  const e = parsed.data;
  return {
    apiKey: e.GOOGLE_MAPS_API_KEY,
    throttleThreshold: e.THROTTLE_THRESHOLD,
    checkpointPath: e.CHECKPOINT_PATH,
    inputCsv: e.INPUT_CSV,
    outputDir: e.OUTPUT_DIR,
  };
}
