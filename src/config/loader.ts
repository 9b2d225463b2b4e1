import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { nbtMapperConfigSchema } from './schema';
import type { NbtMapperConfig } from '../shared/types';
import { createLogger } from '../shared/logger';

const log = createLogger({ module: 'config' });

export interface ConfigWarning {
  field: string;
  message: string;
}

export interface LoadConfigResult {
  config: Required<NbtMapperConfig>;
  warnings: ConfigWarning[];
}

/** Default values used when the file is absent or fields are omitted. */
export const CONFIG_DEFAULTS: Required<NbtMapperConfig> = {
  max_depth: 512,
  on_unmapped: 'omit',
};

/**
 * Load and validate a .nbtmapper.yml configuration file.
 * Returns fully-populated config with defaults applied.
 *
 * - Missing file → defaults
 * - Empty file → defaults
 * - Invalid YAML → E501 warning + defaults
 * - Invalid values → E502 warning + field defaults
 * - Unknown keys → E502 warning with "did you mean?"
 */
export function loadMapperConfig(filePath?: string): LoadConfigResult {
  const result = readConfig(filePath ?? '.nbtmapper.yml');
  for (const warning of result.warnings) {
    log.warn({ field: warning.field }, warning.message);
  }
  return result;
}

function readConfig(resolvedPath: string): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  let rawContent: string;
  try {
    rawContent = fs.readFileSync(resolvedPath, 'utf-8');
  } catch {
    // No file: defaults
    return { config: { ...CONFIG_DEFAULTS }, warnings };
  }

  if (!rawContent || rawContent.trim() === '') {
    return { config: { ...CONFIG_DEFAULTS }, warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E501: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: { ...CONFIG_DEFAULTS }, warnings };
  }

  // YAML holding only comments parses to null
  if (parsed === null || parsed === undefined) {
    return { config: { ...CONFIG_DEFAULTS }, warnings };
  }

  if (!isPlainRecord(parsed)) {
    warnings.push({
      field: '_yaml',
      message: 'E501: Config must be a YAML mapping. Using defaults.',
    });
    return { config: { ...CONFIG_DEFAULTS }, warnings };
  }

  const result = nbtMapperConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: withDefaults(result.data), warnings };
  }

  const rejected = new Set<string>();
  for (const issue of result.error.issues) {
    const fieldPath = issue.path.join('.');
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        const suggestion = findSimilarKey(key);
        const msg = suggestion
          ? `E502: Unknown key "${key}". Did you mean "${suggestion}"?`
          : `E502: Unknown key "${key}".`;
        warnings.push({ field: fieldPath || key, message: msg });
      }
    } else {
      rejected.add(String(issue.path[0]));
      warnings.push({
        field: fieldPath || '_unknown',
        message: `E502: ${issue.message}. Using default for this field.`,
      });
    }
  }

  // Keep the known, valid fields and re-parse
  const retained: Record<string, unknown> = {};
  for (const key of KNOWN_KEYS) {
    if (key in parsed && !rejected.has(key)) retained[key] = parsed[key];
  }
  const retry = nbtMapperConfigSchema.safeParse(retained);
  if (retry.success) {
    return { config: withDefaults(retry.data), warnings };
  }

  return { config: { ...CONFIG_DEFAULTS }, warnings };
}

function withDefaults(overrides: NbtMapperConfig): Required<NbtMapperConfig> {
  return {
    max_depth: overrides.max_depth ?? CONFIG_DEFAULTS.max_depth,
    on_unmapped: overrides.on_unmapped ?? CONFIG_DEFAULTS.on_unmapped,
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Known top-level keys for "did you mean?" suggestions. */
const KNOWN_KEYS = ['max_depth', 'on_unmapped'];

function findSimilarKey(key: string): string | null {
  const lower = key.toLowerCase();
  for (const known of KNOWN_KEYS) {
    if (levenshtein(lower, known) <= 3) {
      return known;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}
