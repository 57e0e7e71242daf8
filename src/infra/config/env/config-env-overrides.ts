import { ConfigError } from '../../../core/models/index.js';
import { isRecord } from '../../../shared/utils/types.js';

type EnvValueType = 'string' | 'boolean' | 'number' | 'json';

interface EnvSpec {
  path: string;
  type: EnvValueType;
}

function normalizeEnvSegment(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

export function envVarNameFromPath(path: string): string {
  const key = path
    .split('.')
    .map(normalizeEnvSegment)
    .filter((segment) => segment.length > 0)
    .join('_');
  return `SLUGWRIGHT_${key}`;
}

function parseEnvValue(envKey: string, raw: string, type: EnvValueType): unknown {
  if (type === 'string') {
    return raw;
  }
  if (type === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    throw new ConfigError(`${envKey} must be one of: true, false`);
  }
  if (type === 'number') {
    const value = Number(raw.trim());
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new ConfigError(`${envKey} must be a number`);
    }
    return value;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigError(`${envKey} must be valid JSON`);
  }
}

function setNested(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = target;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  const leaf = parts[parts.length - 1];
  if (!leaf) return;
  current[leaf] = value;
}

function applyEnvOverrides(target: Record<string, unknown>, specs: readonly EnvSpec[]): void {
  for (const spec of specs) {
    const envKey = envVarNameFromPath(spec.path);
    const raw = process.env[envKey];
    if (raw === undefined) continue;
    setNested(target, spec.path, parseEnvValue(envKey, raw, spec.type));
  }
}

const CONFIG_ENV_SPECS: readonly EnvSpec[] = [
  { path: 'backend', type: 'string' },
  { path: 'case_locale', type: 'string' },
  { path: 'ascii', type: 'boolean' },
  { path: 'max_bytes', type: 'number' },
  { path: 'locale', type: 'string' },
  { path: 'log_level', type: 'string' },
  { path: 'debug', type: 'json' },
  { path: 'debug.enabled', type: 'boolean' },
  { path: 'debug.log_file', type: 'string' },
  { path: 'approximations', type: 'json' },
];

export function applyConfigEnvOverrides(target: Record<string, unknown>): void {
  applyEnvOverrides(target, CONFIG_ENV_SPECS);
}
