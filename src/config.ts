/**
 * Configuration
 * Layer: infra
 *
 * Provided ports:
 *   - config.parse
 *   - config.load
 *   - config.resolvePath
 *
 * Loads the JSON configuration file, validates it with zod and applies
 * environment overrides.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_PROBE_TIMEOUT_MS, DEFAULT_TICK_INTERVAL_MS } from './types';
import { LOG_LEVELS, isLogLevel } from './logger';
import { expandHome } from './paths';
import { parseBooleanFlag } from './utils';

export const DEFAULT_CONFIG_FILE = 'pulsewatch.json';
export const DEFAULT_SESSION_SEPARATOR = '---SESSION---';
export const DEFAULT_TERMINAL_LINE_COUNT = 10;

// -----------------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------------

const PositiveInt = z.number().int().min(1);

const CommandProbeSchema = z.object({
  type: z.literal('command'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  match: z.enum(['exit-code', 'output']).default('exit-code'),
  activePatterns: z.array(z.string()).default([]),
  neutralPatterns: z.array(z.string()).default([]),
});

const TerminalProbeSchema = z.object({
  type: z.literal('terminal'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  sessionSeparator: z.string().min(1).default(DEFAULT_SESSION_SEPARATOR),
  lineCount: PositiveInt.default(DEFAULT_TERMINAL_LINE_COUNT),
  activePatterns: z.array(z.string()).min(1),
  excludePatterns: z.array(z.string()).default([]),
});

const MetricProbeSchema = z.object({
  type: z.literal('metric'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  activateAbove: z.number(),
  deactivateBelow: z.number(),
  progressScale: z.number().positive().optional(),
});

const GrowingFilesProbeSchema = z.object({
  type: z.literal('growing-files'),
  directory: z.string().min(1),
  extensions: z.array(z.string().min(1)).min(1),
});

const ProbeSchema = z.discriminatedUnion('type', [
  CommandProbeSchema,
  TerminalProbeSchema,
  MetricProbeSchema,
  GrowingFilesProbeSchema,
]);

const PrecheckSchema = z.object({
  process: z.string().min(1),
});

const SourceSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
  platforms: z.array(z.enum(['linux', 'darwin', 'win32'])).optional(),
  debounce: z.object({
    activateAfter: PositiveInt,
    deactivateAfter: PositiveInt,
  }),
  timeoutMs: z.number().positive().nullable().optional(),
  pollEvery: PositiveInt.default(1),
  idlePollEvery: PositiveInt.optional(),
  precheck: PrecheckSchema.optional(),
  debug: z.boolean().default(false),
  probe: ProbeSchema,
});

export const MonitorConfigSchema = z
  .object({
    tickIntervalMs: z.number().int().positive().default(DEFAULT_TICK_INTERVAL_MS),
    defaultTimeoutMs: z.number().positive().default(DEFAULT_PROBE_TIMEOUT_MS),
    diagnostics: z.boolean().default(false),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    statusFile: z.string().min(1).optional(),
    sources: z.array(SourceSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.sources.forEach((source, index) => {
      if (seen.has(source.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'id'],
          message: `Duplicate source id "${source.id}"`,
        });
      }
      seen.add(source.id);

      const probe = source.probe;
      if (probe.type === 'metric' && probe.deactivateBelow > probe.activateAbove) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'probe', 'deactivateBelow'],
          message: 'deactivateBelow must not exceed activateAbove',
        });
      }
      if (probe.type === 'terminal') {
        const patterns = [...probe.activePatterns, ...probe.excludePatterns];
        for (const pattern of patterns) {
          if (!isValidPattern(pattern)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['sources', index, 'probe'],
              message: `Invalid regular expression: ${pattern}`,
            });
          }
        }
      }
    });
  });

export type ProbeConfig = z.infer<typeof ProbeSchema>;
export type PrecheckConfig = z.infer<typeof PrecheckSchema>;
export type SourceConfig = z.infer<typeof SourceSchema>;
export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'u');
    return true;
  } catch {
    return false;
  }
}

// -----------------------------------------------------------------------------
// Port: config.parse
// -----------------------------------------------------------------------------

export interface LoadConfigResult {
  success: true;
  config: MonitorConfig;
}

export interface LoadConfigError {
  success: false;
  error: string;
  /** True if the config file doesn't exist */
  notFound: boolean;
}

export type LoadConfigOutcome = LoadConfigResult | LoadConfigError;

/**
 * Validates raw JSON and applies environment overrides
 * (PULSEWATCH_DIAGNOSTICS, PULSEWATCH_LOG_LEVEL).
 */
export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): LoadConfigOutcome {
  const parsed = MonitorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, error: formatIssues(parsed.error), notFound: false };
  }

  const config = parsed.data;

  const diagnostics = env['PULSEWATCH_DIAGNOSTICS'];
  if (diagnostics !== undefined && diagnostics !== '') {
    config.diagnostics = parseBooleanFlag(diagnostics);
  }

  const level = env['PULSEWATCH_LOG_LEVEL']?.trim().toLowerCase();
  if (level) {
    if (!isLogLevel(level)) {
      return {
        success: false,
        error: `PULSEWATCH_LOG_LEVEL: expected one of ${LOG_LEVELS.join(', ')} (got "${level}")`,
        notFound: false,
      };
    }
    config.logLevel = level;
  }

  return { success: true, config };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

// -----------------------------------------------------------------------------
// Port: config.load
// -----------------------------------------------------------------------------

/**
 * Reads and validates the config file.
 */
export function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): LoadConfigOutcome {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      return { success: false, error: `Config file not found: ${configPath}`, notFound: true };
    }
    return {
      success: false,
      error: `Failed to read config ${configPath}: ${error.message}`,
      notFound: false,
    };
  }

  const outcome = parseConfig(raw, env);
  if (!outcome.success) {
    return { ...outcome, error: `Invalid config ${configPath}: ${outcome.error}` };
  }
  return outcome;
}

// -----------------------------------------------------------------------------
// Port: config.resolvePath
// -----------------------------------------------------------------------------

/**
 * First CLI argument, then PULSEWATCH_CONFIG, then ./pulsewatch.json.
 */
export function resolveConfigPath(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): string {
  const candidate = argv[0] ?? env['PULSEWATCH_CONFIG'] ?? DEFAULT_CONFIG_FILE;
  return path.resolve(expandHome(candidate));
}
