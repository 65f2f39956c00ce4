/**
 * Per-invocation configuration.
 *
 * Commander's raw options are validated here and frozen; the resulting value is
 * passed explicitly to every component instead of living in module state.
 */

import { z } from 'zod';

export const DEFAULT_SOPS_BINARY = 'sops';

/**
 * Raised when command-line options fail validation.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const SharedSchema = z.object({
  color: z.boolean().default(true),
  sopsBinary: z.string().min(1).default(DEFAULT_SOPS_BINARY),
  debug: z.boolean().default(false),
});

const ToolSchema = z
  .string()
  .trim()
  .min(1, 'Diff tool must not be empty')
  .optional();

export const DiffConfigSchema = SharedSchema.extend({
  summary: z.boolean().default(false),
  format: z.enum(['auto', 'yaml', 'json', 'env']).default('auto'),
  diffTool: ToolSchema,
  git: z.boolean().default(false),
  errorOnDecrypted: z.boolean().default(true),
  comparison: z.enum(['textual', 'typed']).default('textual'),
  json: z.boolean().default(false),
});

export const ConflictConfigSchema = SharedSchema.extend({
  output: z.string().min(1).optional(),
});

export const MergeConfigSchema = SharedSchema.extend({
  diffTool: ToolSchema,
  output: z.string().min(1).optional(),
});

export const SetupConfigSchema = SharedSchema.extend({
  scope: z.enum(['global', 'local']).default('global'),
});

export type DiffConfig = Readonly<z.infer<typeof DiffConfigSchema>>;
export type ConflictConfig = Readonly<z.infer<typeof ConflictConfigSchema>>;
export type MergeConfig = Readonly<z.infer<typeof MergeConfigSchema>>;
export type SetupConfig = Readonly<z.infer<typeof SetupConfigSchema>>;

/**
 * Options as commander hands them to the diff action.
 */
export interface DiffCommandOptions {
  summary?: boolean;
  format?: string;
  color?: boolean;
  diffTool?: string;
  git?: boolean;
  errorOnDecrypted?: boolean;
  strictTypes?: boolean;
  json?: boolean;
}

export interface ConflictCommandOptions {
  output?: string;
  color?: boolean;
}

export interface MergeCommandOptions {
  diffTool?: string;
  output?: string;
}

export interface SetupCommandOptions {
  local?: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Settings taken from the environment.
 * - SECRETDIFF_SOPS: sops binary to run
 * - SECRETDIFF_DEBUG=1: debug tracing on stderr
 */
function fromEnv(env: Env): { sopsBinary?: string; debug: boolean } {
  const sopsBinary = env.SECRETDIFF_SOPS?.trim();
  return {
    sopsBinary: sopsBinary ? sopsBinary : undefined,
    debug: env.SECRETDIFF_DEBUG === '1',
  };
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): Readonly<z.infer<S>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new UsageError(`Invalid option ${where}${issue?.message ?? 'unknown error'}`);
  }
  return Object.freeze(result.data);
}

export function loadDiffConfig(options: DiffCommandOptions, env: Env = process.env): DiffConfig {
  return parseWith(DiffConfigSchema, {
    ...fromEnv(env),
    summary: options.summary,
    format: options.format,
    color: options.color,
    diffTool: options.diffTool,
    git: options.git,
    errorOnDecrypted: options.errorOnDecrypted,
    comparison: options.strictTypes ? 'typed' : 'textual',
    json: options.json,
  });
}

export function loadConflictConfig(options: ConflictCommandOptions, env: Env = process.env): ConflictConfig {
  return parseWith(ConflictConfigSchema, {
    ...fromEnv(env),
    output: options.output,
    color: options.color,
  });
}

export function loadMergeConfig(options: MergeCommandOptions, env: Env = process.env): MergeConfig {
  return parseWith(MergeConfigSchema, {
    ...fromEnv(env),
    diffTool: options.diffTool,
    output: options.output,
  });
}

export function loadSetupConfig(options: SetupCommandOptions, env: Env = process.env): SetupConfig {
  return parseWith(SetupConfigSchema, {
    ...fromEnv(env),
    scope: options.local ? 'local' : 'global',
  });
}
