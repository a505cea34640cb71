/**
 * Zod schemas for the runspec.yaml document
 * Field names follow the file format (snake_case); the loader maps them
 * onto the camelCase model in types.ts
 */

import { z } from 'zod';
import { MatchModes, PrintPolicies } from './outcomes.js';

// ============================================================================
// Shared pieces
// ============================================================================

// Node timers hold at most 2^31-1 ms; longer delays fire immediately
export const MAX_TIMEOUT_MS = 2_147_483_647;
const MAX_TIMEOUT_SECONDS = MAX_TIMEOUT_MS / 1000;

const Seconds = z
  .number({ invalid_type_error: 'must be a number of seconds' })
  .finite()
  .positive({ message: 'must be a positive number of seconds' })
  .max(MAX_TIMEOUT_SECONDS, { message: `must be at most ${MAX_TIMEOUT_SECONDS} seconds` });

// Program followed by its arguments
export const ArgvSchema = z
  .tuple([z.string().min(1, { message: 'program must not be empty' })], {
    invalid_type_error: 'must be a list of strings',
  })
  .rest(z.string());

export const ShellCommandSchema = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'command must not be empty' });

export const CommandSchema = z.union([ShellCommandSchema, ArgvSchema]);

const modeValues = Object.values(MatchModes).join(', ');

export const MatchModeSchema = z.enum(
  [MatchModes.EXACT, MatchModes.CONTAINS, MatchModes.PREFIX, MatchModes.GLOB],
  { errorMap: () => ({ message: `must be one of ${modeValues}` }) }
);

const policyValues = Object.values(PrintPolicies).join(', ');

export const PrintWhenSchema = z.enum(
  [PrintPolicies.PASS, PrintPolicies.FAIL, PrintPolicies.ALWAYS, PrintPolicies.NEVER],
  { errorMap: () => ({ message: `must be one of ${policyValues}` }) }
);

// YAML turns `PORT: 8080` into a number; environment values are always text
const EnvValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

// ============================================================================
// Test case
// ============================================================================

export const ExpectSchema = z
  .object({
    exit_code: z.number().int({ message: 'exit_code must be an integer' }).optional(),
    stdout: z.string().optional(),
    stdout_mode: MatchModeSchema.optional(),
    stderr: z.string().optional(),
    stderr_mode: MatchModeSchema.optional(),
  })
  .strict();

export const PrintSchema = z
  .object({
    stdout: PrintWhenSchema.optional(),
    stderr: PrintWhenSchema.optional(),
  })
  .strict();

export const TestCaseSchema = z
  .object({
    name: z
      .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
      .min(1, { message: 'name must not be empty' }),
    command: CommandSchema.optional(),
    script: z.string().min(1, { message: 'script must not be empty' }).optional(),
    runner: ArgvSchema.optional(),
    args: z.array(z.string()).optional(),
    cwd: z.string().min(1).optional(),
    env: z.record(EnvValueSchema).optional(),
    stdin: z.string().optional(),
    timeout: Seconds.optional(),
    expect: ExpectSchema.optional(),
    print: PrintSchema.optional(),
  })
  .strict();

// ============================================================================
// Document
// ============================================================================

export const DefaultsSchema = z
  .object({
    timeout: Seconds.optional(),
    cwd: z.string().min(1).optional(),
    dir: z.string().min(1).optional(),
    runner: ArgvSchema.optional(),
  })
  .strict();

export const RunFileSchema = z
  .object({
    defaults: DefaultsSchema.optional(),
    tests: z.array(TestCaseSchema, {
      required_error: 'tests is required',
      invalid_type_error: 'tests must be a list',
    }),
  })
  .strict();

export type RunFile = z.infer<typeof RunFileSchema>;
export type TestCaseEntry = z.infer<typeof TestCaseSchema>;
export type ExpectEntry = z.infer<typeof ExpectSchema>;
