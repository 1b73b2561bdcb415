/**
 * Runtime configuration read from the environment.
 *
 * SETMETRICS_LOG_LEVEL    debug | info | warn | error (default: warn)
 * SETMETRICS_LOG_FORMAT   text | json (default: text)
 * SETMETRICS_DIAGNOSTICS  log | silent | error (default: log)
 */

import { z } from 'zod';
import { SimilarityError } from './errors/index.js';
import { Logger } from './logger.js';

export const diagnosticModeSchema = z.enum(['log', 'silent', 'error']);

export const similarityConfigSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
    logFormat: z.enum(['text', 'json']).default('text'),
    diagnostics: diagnosticModeSchema.default('log'),
  })
  .strict();

export type DiagnosticMode = z.infer<typeof diagnosticModeSchema>;
export type SimilarityConfig = z.infer<typeof similarityConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function parseConfig(input: unknown): SimilarityConfig {
  const parsed = similarityConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SimilarityError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid configuration: ${issues}`,
      suggestion: 'Check the SETMETRICS_* environment variables',
    });
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SimilarityConfig {
  return parseConfig({
    logLevel: emptyToUndefined(env['SETMETRICS_LOG_LEVEL']),
    logFormat: emptyToUndefined(env['SETMETRICS_LOG_FORMAT']),
    diagnostics: emptyToUndefined(env['SETMETRICS_DIAGNOSTICS']),
  });
}

let current: SimilarityConfig | undefined;
let logger: Logger | undefined;
let loggerOverride: Logger | undefined;

export function getConfig(): SimilarityConfig {
  current ??= loadConfig();
  return current;
}

export function setConfig(overrides: Partial<SimilarityConfig>): SimilarityConfig {
  current = parseConfig({ ...getConfig(), ...overrides });
  logger = undefined;
  return current;
}

export function resetConfig(): void {
  current = undefined;
  logger = undefined;
  loggerOverride = undefined;
}

/**
 * Logger built from the active configuration, unless one was installed with
 * setLogger.
 */
export function getLogger(): Logger {
  if (loggerOverride) return loggerOverride;
  if (!logger) {
    const { logLevel, logFormat } = getConfig();
    logger = new Logger({ level: logLevel, format: logFormat });
  }
  return logger;
}

export function setLogger(next: Logger | undefined): void {
  loggerOverride = next;
}
