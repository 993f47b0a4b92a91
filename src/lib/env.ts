import { z } from 'zod';

import { CONFIG_PRESETS, ENGINE_LOG_LEVELS } from '../modules/config/config.constants';
import { InvalidEnvironmentError } from './errors';

const booleanFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value !== 'string') return value;
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
    return value;
  }, z.boolean().default(defaultValue));

const optionalPath = z.preprocess(
  (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
  z.string().min(1).optional(),
);

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  LOG_FILE: optionalPath,
  VLESS2JSON_STRICT: booleanFromEnv(false),
  VLESS2JSON_PRESET: z.enum(CONFIG_PRESETS).default('basic'),
  VLESS2JSON_OUTPUT: z.string().min(1).default('config.json'),
  VLESS2JSON_ENGINE_LOGLEVEL: z.enum(ENGINE_LOG_LEVELS).default('warning'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (parsed.success) return parsed.data;

  const fieldErrors = parsed.error.flatten().fieldErrors;
  const names = Object.keys(fieldErrors).sort();
  throw new InvalidEnvironmentError({
    field: names.join(', '),
    message: 'Invalid environment variables',
    details: fieldErrors,
  });
}
