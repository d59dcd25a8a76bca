import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { DEFAULT_CYCLE_DURATION_SECS } from "@roscaflow/shared";

loadEnv();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  API_PORT: z.coerce.number().default(4000),
  AUTH_SECRET: z.string().min(16).default("change-this-in-production-please"),
  EXPOSE_DEV_TOOLS: z
    .string()
    .optional()
    .transform((value) => value === "true"),
  CUSTODY_ADDRESS: z.string().min(1).default("roscaflow-custody"),
  DEFAULT_CYCLE_DURATION_SECS: z.coerce.number().int().positive().default(DEFAULT_CYCLE_DURATION_SECS),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid env configuration: ${parsed.error.message}`);
}

export const env = parsed.data;
