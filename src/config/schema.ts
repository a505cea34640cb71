/**
 * Settings schema with validation
 */

import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../models/schemas.js';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

export const SettingsSchema = z.object({
  runner: z.object({
    configPath: z.string().min(1).default('runspec.yaml'),
    defaultTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(10000),
    killGraceMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(2000),
  }),

  logging: z.object({
    level: LogLevelSchema.default('warn'),
    pretty: z.boolean().default(false),
  }),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
