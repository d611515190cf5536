import * as fs from 'fs';
import * as path from 'path';
import { getConfigDir } from './config-paths.js';
import { createValidator, formatSchemaIssues, toSchemaIssues, type SchemaIssue } from './schema-validator.js';
import type { ConfirmationPolicy } from '../../domain/confirmation/types.js';
import { DEFAULT_MAX_RETRIES } from '../../domain/loop/types.js';

export interface CmdwiseSettings {
  provider: string;
  /** Empty means the provider's default model */
  model: string;
  /** Empty means the provider's default base URL */
  baseUrl: string;
  /** Language for rationales, e.g. "English" */
  language: string;
  maxRetries: number;
  commandTimeoutMs: number;
  providerTimeoutMs: number;
  confirmation: ConfirmationPolicy;
  /** Custom risk table, replaces or extends the built-in one */
  riskPatternsPath: string;
  extendRiskPatterns: boolean;
  failureContext: {
    maxSummaryBytes: number;
    maxSummaries: number;
    maxStdoutBytes: number;
    maxStderrBytes: number;
  };
  history: boolean;
  attemptLog: boolean;
}

/**
 * Partial settings as they come from a file, the environment or flags
 */
export type SettingsOverrides = Partial<Omit<CmdwiseSettings, 'failureContext'>> & {
  failureContext?: Partial<CmdwiseSettings['failureContext']>;
};

type SettingsDocument = SettingsOverrides & { $schema?: string };

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: SchemaIssue[]
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export const DEFAULT_SETTINGS: CmdwiseSettings = {
  provider: 'openai',
  model: '',
  baseUrl: '',
  language: 'English',
  maxRetries: DEFAULT_MAX_RETRIES,
  commandTimeoutMs: 60000,
  providerTimeoutMs: 60000,
  confirmation: 'prompt',
  riskPatternsPath: '',
  extendRiskPatterns: true,
  failureContext: {
    maxSummaryBytes: 600,
    maxSummaries: 5,
    maxStdoutBytes: 2000,
    maxStderrBytes: 500,
  },
  history: true,
  attemptLog: true,
};

export const SETTINGS_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'cmdwise settings',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    provider: { type: 'string', minLength: 1 },
    model: { type: 'string' },
    baseUrl: { type: 'string', anyOf: [{ const: '' }, { format: 'uri' }] },
    language: { type: 'string', minLength: 1 },
    maxRetries: { type: 'integer', minimum: 0 },
    commandTimeoutMs: { type: 'integer', minimum: 1 },
    providerTimeoutMs: { type: 'integer', minimum: 1 },
    confirmation: { enum: ['prompt', 'approve', 'decline'] },
    riskPatternsPath: { type: 'string' },
    extendRiskPatterns: { type: 'boolean' },
    failureContext: {
      type: 'object',
      properties: {
        maxSummaryBytes: { type: 'integer', minimum: 64 },
        maxSummaries: { type: 'integer', minimum: 1 },
        maxStdoutBytes: { type: 'integer', minimum: 0 },
        maxStderrBytes: { type: 'integer', minimum: 0 },
      },
      additionalProperties: false,
    },
    history: { type: 'boolean' },
    attemptLog: { type: 'boolean' },
  },
  additionalProperties: false,
};

export function getSettingsPath(): string {
  return path.join(getConfigDir(), 'cmdwise.json');
}

export function validateSettings(value: unknown, source: string = 'settings'): SettingsDocument {
  const validate = createValidator().compile<SettingsDocument>(SETTINGS_SCHEMA);

  if (!validate(value)) {
    const errors = toSchemaIssues(validate.errors);
    throw new ConfigValidationError(`Invalid ${source}: ${formatSchemaIssues(errors)}`, errors);
  }

  return value;
}

/**
 * Read cmdwise.json. Missing file means no overrides.
 * Throws ConfigValidationError on malformed JSON or schema violations.
 */
export function loadSettingsFile(filePath: string = getSettingsPath()): SettingsOverrides {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Invalid ${filePath}: ${message}`, [{ path: '/', message }]);
  }

  const { $schema: _schema, ...settings } = validateSettings(parsed, filePath);
  return settings;
}

function toNonNegativeInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigValidationError(`${name} must be a non-negative integer, got "${value}"`, [
      { path: `/${name}`, message: 'must be a non-negative integer' },
    ]);
  }
  return parsed;
}

function toBoolean(value: string | undefined): boolean | undefined {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function toStringValue(value: string | undefined): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

export function resolveSettingsFromEnvironment(env: NodeJS.ProcessEnv = process.env): SettingsOverrides {
  const overrides: Record<string, unknown> = {
    provider: toStringValue(env.CMDWISE_PROVIDER),
    model: toStringValue(env.CMDWISE_MODEL),
    baseUrl: toStringValue(env.CMDWISE_BASE_URL),
    language: toStringValue(env.CMDWISE_LANGUAGE),
    maxRetries: toNonNegativeInt(env.CMDWISE_MAX_RETRIES, 'CMDWISE_MAX_RETRIES'),
    commandTimeoutMs: toNonNegativeInt(env.CMDWISE_COMMAND_TIMEOUT_MS, 'CMDWISE_COMMAND_TIMEOUT_MS'),
    confirmation: toStringValue(env.CMDWISE_CONFIRMATION),
    history: toBoolean(env.CMDWISE_HISTORY),
  };

  for (const key of Object.keys(overrides)) {
    if (overrides[key] === undefined) {
      delete overrides[key];
    }
  }

  return validateSettings(overrides, 'environment settings');
}

function pick<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

/**
 * Merge layers left to right; later layers win, undefined values are skipped.
 */
export function mergeSettings(base: CmdwiseSettings, ...layers: SettingsOverrides[]): CmdwiseSettings {
  return layers.reduce<CmdwiseSettings>((merged, layer) => {
    const failureContext = layer.failureContext ?? {};
    return {
      provider: pick(layer.provider, merged.provider),
      model: pick(layer.model, merged.model),
      baseUrl: pick(layer.baseUrl, merged.baseUrl),
      language: pick(layer.language, merged.language),
      maxRetries: pick(layer.maxRetries, merged.maxRetries),
      commandTimeoutMs: pick(layer.commandTimeoutMs, merged.commandTimeoutMs),
      providerTimeoutMs: pick(layer.providerTimeoutMs, merged.providerTimeoutMs),
      confirmation: pick(layer.confirmation, merged.confirmation),
      riskPatternsPath: pick(layer.riskPatternsPath, merged.riskPatternsPath),
      extendRiskPatterns: pick(layer.extendRiskPatterns, merged.extendRiskPatterns),
      failureContext: {
        maxSummaryBytes: pick(failureContext.maxSummaryBytes, merged.failureContext.maxSummaryBytes),
        maxSummaries: pick(failureContext.maxSummaries, merged.failureContext.maxSummaries),
        maxStdoutBytes: pick(failureContext.maxStdoutBytes, merged.failureContext.maxStdoutBytes),
        maxStderrBytes: pick(failureContext.maxStderrBytes, merged.failureContext.maxStderrBytes),
      },
      history: pick(layer.history, merged.history),
      attemptLog: pick(layer.attemptLog, merged.attemptLog),
    };
  }, base);
}

/**
 * Effective settings: defaults < cmdwise.json < environment < flags.
 * Read once at startup.
 */
export function loadSettings(
  cliOverrides: SettingsOverrides = {},
  options: { filePath?: string; env?: NodeJS.ProcessEnv } = {}
): CmdwiseSettings {
  const fromFile = loadSettingsFile(options.filePath);
  const fromEnv = resolveSettingsFromEnvironment(options.env);
  return mergeSettings(DEFAULT_SETTINGS, fromFile, fromEnv, validateSettings(cliOverrides, 'command-line options'));
}
