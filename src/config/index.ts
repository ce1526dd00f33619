/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const ConfigSchema = z.object({
  // Formula evaluator
  formula: z.object({
    maxLength: z.coerce.number().int().positive().default(512),
  }),

  // HTTP
  port: z.coerce.number().int().positive().default(3000),
  jsonBodyLimit: z.string().default("5mb"),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    formula: {
      maxLength: env.FORMULA_MAX_LENGTH,
    },
    port: env.PORT,
    jsonBodyLimit: env.JSON_BODY_LIMIT,
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
  };

  return ConfigSchema.parse(raw);
}

/** Singleton config instance */
export const config = loadConfig();
