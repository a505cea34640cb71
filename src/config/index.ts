/**
 * Settings loader
 * Reads process-level settings from environment variables; the CLI loads a
 * .env file into the environment first
 */

import { SettingsSchema, type Settings } from './schema.js';
import { Ok, Err, type Result } from '../models/index.js';

type Env = Readonly<Record<string, string | undefined>>;

// Unset means "use the default"; anything unparsable is left for the schema to reject
function getEnvNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number(value);
}

function getEnvBoolean(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  return value === 'true' || value === '1';
}

export function loadSettings(env: Env = process.env): Result<Settings, string> {
  const settings = {
    runner: {
      configPath: env['RUNSPEC_CONFIG'] || undefined,
      defaultTimeoutMs: getEnvNumber(env, 'RUNSPEC_DEFAULT_TIMEOUT_MS'),
      killGraceMs: getEnvNumber(env, 'RUNSPEC_KILL_GRACE_MS'),
    },
    logging: {
      level: env['LOG_LEVEL'] || undefined,
      pretty: getEnvBoolean(env, 'LOG_PRETTY'),
    },
  };

  const parsed = SettingsSchema.safeParse(settings);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return Err(`Invalid settings: ${detail}`);
  }

  return Ok(parsed.data);
}

export type { Settings, LogLevel } from './schema.js';
