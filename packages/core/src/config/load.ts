import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError, type ValidationIssue } from '../types/errors';
import { configSchema, ENV_VARS } from './schema';
import type { StepwiseConfig, StepwiseConfigInput } from './types';

const ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true });
addFormats(ajv);

const validate = ajv.compile<StepwiseConfig>(configSchema);

const GROUPS = ['execution', 'retry', 'circuitBreaker', 'cache', 'metrics'] as const;

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Copy dropping undefined values, so they take their defaults */
function defined(source: object | undefined): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (!source) return out;
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function toIssues(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors ?? []).map(e => {
    const base = e.instancePath.replace(/^\//, '').replace(/\//g, '.');
    const extra = isRecord(e.params) ? e.params.additionalProperty ?? e.params.missingProperty : undefined;
    const path = typeof extra === 'string' ? (base ? `${base}.${extra}` : extra) : base || '(root)';
    return { path, message: e.message ?? 'is invalid', severity: 'error' };
  });
}

function finish(raw: RawConfig): StepwiseConfig {
  if (!validate(raw)) {
    throw new ConfigurationError(toIssues(validate.errors));
  }
  return raw;
}

/**
 * Fill and validate plain configuration values.
 * @throws ConfigurationError listing every invalid value
 */
export function resolveConfig(input?: StepwiseConfigInput): StepwiseConfig {
  const raw: RawConfig = defined(input);
  for (const group of GROUPS) {
    const value = input?.[group];
    raw[group] = isRecord(value) ? defined(value) : value ?? {};
  }
  return finish(raw);
}

/**
 * Read configuration from environment variables.
 * Empty variables count as unset.
 * @throws ConfigurationError listing every invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StepwiseConfig {
  const raw: RawConfig = {};
  for (const group of GROUPS) raw[group] = {};

  for (const [name, path] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value === undefined || value.trim() === '') continue;
    if (path.length === 1) {
      raw[path[0]] = value.trim();
      continue;
    }
    const group = raw[path[0]];
    if (isRecord(group)) group[path[1]] = value.trim();
  }

  return finish(raw);
}
