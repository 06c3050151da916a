import * as path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_DIR: z.string().min(1).default('data'),
  LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export interface RealtyConfig {
  port: number;
  /** Absolute path of the directory holding one sub-directory per category. */
  dataDir: string;
  /** Upper bound on reading every category from disk during a load. */
  loadTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RealtyConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }

  return {
    port: parsed.data.PORT,
    dataDir: path.resolve(parsed.data.DATA_DIR),
    loadTimeoutMs: parsed.data.LOAD_TIMEOUT_MS,
  };
}
