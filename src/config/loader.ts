// Config loader: reads exec-tools.yaml and deep-merges it over the defaults.
// A missing file is not an error; a malformed one is.
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ExecToolsError, ExecToolsErrorCode } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { DirectoryContext } from '../exec/directory.js';
import { Exec, type ExecDeps } from '../exec/exec.js';

export const CONFIG_ENV_VAR = 'EXEC_TOOLS_CONFIG';
export const DEFAULT_CONFIG_FILE = 'exec-tools.yaml';

const ConfigSchema = z
  .object({
    log_level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    check_assert: z
      .object({
        retries: z.number().int().min(1).default(1),
        pollrate_seconds: z.number().min(0).default(60),
      })
      .strict()
      .default({}),
  })
  .strict();

export type ExecToolsConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: ExecToolsConfig = ConfigSchema.parse({});

export interface ConfigResult {
  config: ExecToolsConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = path.resolve(explicitPath ?? (process.env[CONFIG_ENV_VAR] || DEFAULT_CONFIG_FILE));
  if (!existsSync(configPath)) {
    return { config: DEFAULT_CONFIG, configPath, fromFile: false };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ExecToolsError(ExecToolsErrorCode.CONFIG_INVALID, `Cannot read config: ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  // An empty document parses to null.
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ExecToolsError(ExecToolsErrorCode.CONFIG_INVALID, `Invalid config: ${configPath}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    });
  }
  return { config: parsed.data, configPath, fromFile: true };
}

/** Build an Exec wired from config; `overrides` replace individual dependencies. */
export function createExec(config: ExecToolsConfig = DEFAULT_CONFIG, overrides: Partial<ExecDeps> = {}): Exec {
  return new Exec({
    logger: overrides.logger ?? createLogger(config.log_level),
    directory: overrides.directory ?? new DirectoryContext(),
    sleep: overrides.sleep,
    defaults: overrides.defaults ?? {
      retries: config.check_assert.retries,
      pollrate: config.check_assert.pollrate_seconds,
    },
  });
}
