import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, GLOBAL } from '../domain/index.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
const namespaceSchema = z.string().min(1).max(255);
const timeoutSchema = z.number().int().nonnegative();

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Dispatcher runtime settings.
 *
 * `handlerTimeoutMs` only applies to `dispatchAsync()`; 0 disables it.
 */
export interface DispatcherConfig {
  defaultNamespace: string;
  logLevel: LogLevel;
  handlerTimeoutMs: number;
  captureStackTraces: boolean;
}

export const DEFAULT_CONFIG: DispatcherConfig = {
  defaultNamespace: GLOBAL,
  logLevel: 'info',
  handlerTimeoutMs: 0,
  captureStackTraces: true,
};

/** Shape of config/dispatcher.yaml. Every key is optional. */
const configFileSchema = z
  .object({
    default_namespace: namespaceSchema.optional(),
    log_level: logLevelSchema.optional(),
    handler_timeout_ms: timeoutSchema.optional(),
    capture_stack_traces: z.boolean().optional(),
  })
  .strict();

/** Runtime shape of a resolved DispatcherConfig, same constraints as the file. */
const dispatcherConfigSchema = z
  .object({
    defaultNamespace: namespaceSchema,
    logLevel: logLevelSchema,
    handlerTimeoutMs: timeoutSchema,
    captureStackTraces: z.boolean(),
  })
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/**
 * Merges programmatic overrides over DEFAULT_CONFIG and validates the
 * result. Keys set to `undefined` keep their default.
 */
export function resolveDispatcherConfig(overrides: Partial<DispatcherConfig> = {}): DispatcherConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const result = dispatcherConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...defined });
  if (!result.success) {
    throw new ConfigurationError('Invalid dispatcher config', formatIssues(result.error));
  }
  return result.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function readConfigFile(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) return null;
    throw new ConfigurationError(`Cannot read dispatcher config at ${filePath}`, [], { cause: err });
  }
}

function parseYaml(content: string, filePath: string): unknown {
  try {
    const parsed: unknown = parse(content);
    return parsed ?? {};
  } catch (err: unknown) {
    throw new ConfigurationError(`Dispatcher config at ${filePath} is not valid YAML`, [], { cause: err });
  }
}

/**
 * Loads dispatcher configuration from YAML.
 *
 * A missing file yields DEFAULT_CONFIG. A file that exists but does not
 * validate raises ConfigurationError. `LOG_LEVEL` in `env` overrides
 * `log_level`.
 */
export function loadDispatcherConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): DispatcherConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'dispatcher.yaml');
  const content = readConfigFile(filePath);
  const raw = content === null ? {} : parseYaml(content, filePath);

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid dispatcher config at ${filePath}`,
      formatIssues(result.error),
    );
  }
  const file = result.data;

  let logLevel = file.log_level ?? DEFAULT_CONFIG.logLevel;
  const envLevel = env['LOG_LEVEL'];
  if (envLevel !== undefined && envLevel !== '') {
    const parsedLevel = logLevelSchema.safeParse(envLevel);
    if (!parsedLevel.success) {
      throw new ConfigurationError(`Invalid LOG_LEVEL '${envLevel}'`);
    }
    logLevel = parsedLevel.data;
  }

  return {
    defaultNamespace: file.default_namespace ?? DEFAULT_CONFIG.defaultNamespace,
    logLevel,
    handlerTimeoutMs: file.handler_timeout_ms ?? DEFAULT_CONFIG.handlerTimeoutMs,
    captureStackTraces: file.capture_stack_traces ?? DEFAULT_CONFIG.captureStackTraces,
  };
}
