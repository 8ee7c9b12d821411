import type { z } from 'zod';
import type { LogLevel } from '../logging/logger.js';
import { EvaluatorConfigSchema } from '../schemas/config.schema.js';

export interface EvaluatorConfig {
  headless: boolean;
  browserWidth: number;
  browserHeight: number;
  userAgent: string;
  requestTimeoutMs: number;
  runTimeoutMs: number;
  runDir?: string;
  logLevel: LogLevel;
  mode: 'dev' | 'prod';
}

export class ConfigError extends Error {
  constructor(public issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Read configuration from environment variables. Unset variables take defaults. */
export function loadConfig(env: Record<string, string | undefined> = process.env): EvaluatorConfig {
  const parsed = EvaluatorConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  const values = parsed.data;
  return {
    headless: values.EVAL_HEADLESS,
    browserWidth: values.EVAL_BROWSER_WIDTH,
    browserHeight: values.EVAL_BROWSER_HEIGHT,
    userAgent: values.EVAL_USER_AGENT,
    requestTimeoutMs: values.EVAL_REQUEST_TIMEOUT_MS,
    runTimeoutMs: values.EVAL_RUN_TIMEOUT_MS,
    runDir: values.EVAL_RUN_DIR,
    logLevel: values.LOG_LEVEL,
    mode: values.EVAL_MODE,
  };
}
