import { z } from 'zod';

/** An empty variable (`NAME=`) counts as unset. */
function envVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const EvaluatorConfigSchema = z.object({
  EVAL_HEADLESS: envVar(BooleanFlagSchema.default('true')),
  EVAL_BROWSER_WIDTH: envVar(z.coerce.number().int().positive().default(1920)),
  EVAL_BROWSER_HEIGHT: envVar(z.coerce.number().int().positive().default(1080)),
  EVAL_USER_AGENT: envVar(z.string().min(1).default('HTML-QA/0.1')),
  EVAL_REQUEST_TIMEOUT_MS: envVar(z.coerce.number().int().positive().default(30_000)),
  EVAL_RUN_TIMEOUT_MS: envVar(z.coerce.number().int().positive().default(300_000)),
  EVAL_RUN_DIR: envVar(z.string().min(1).optional()),
  LOG_LEVEL: envVar(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')),
  EVAL_MODE: envVar(z.enum(['dev', 'prod']).default('dev')),
});
