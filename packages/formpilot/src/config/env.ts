import { z } from 'zod';

export const DEFAULT_FORM_URL = 'http://localhost:8080/forms/survey/viewform';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  FORMPILOT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  FORMPILOT_LOG_FILE: z.string().min(1).default('formpilot.log'),
  FORMPILOT_SCREENSHOT_DIR: z.string().min(1).default('screenshots'),
  FORMPILOT_HEADLESS: booleanFlag.default('true'),
  FORMPILOT_FORM_URL: z.string().url().default(DEFAULT_FORM_URL),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Parse an explicit environment without touching the cached process env. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}
