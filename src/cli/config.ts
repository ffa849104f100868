import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';

export const CONFIG_FILE_NAME = 'rulegen.yaml';

/**
 * Settings read from rulegen.yaml. Every key is optional; command-line
 * flags override them.
 */
export interface RuleGenFileConfig {
  prefix?: string;
  build_file_names?: string[];
  build_tags?: string[];
  external?: string;
  proto?: string;
  structure?: string;
  known_imports?: string[];
  language?: string;
}

const STRING_KEYS = ['prefix', 'external', 'proto', 'structure', 'language'] as const;
const LIST_KEYS = ['build_file_names', 'build_tags', 'known_imports'] as const;
const KNOWN_KEYS = new Set<string>([...STRING_KEYS, ...LIST_KEYS]);

function asStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Invalid ${field}: expected array of strings`);
  }
  return value;
}

function asString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new Error(`Invalid ${field}: expected string`);
  }
  return value;
}

function resolveConfigPath(cwd: string, repoRoot: string, explicitConfigPath?: string): string | null {
  if (explicitConfigPath) {
    const resolved = path.resolve(cwd, explicitConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Configuration file not found: ${resolved}`);
    }
    if (fs.statSync(resolved).isDirectory()) {
      throw new Error(`Expected file, got directory: ${resolved}`);
    }
    return resolved;
  }

  const defaultConfig = path.join(repoRoot, CONFIG_FILE_NAME);
  return fs.existsSync(defaultConfig) && !fs.statSync(defaultConfig).isDirectory()
    ? defaultConfig
    : null;
}

export function loadRuleGenConfig(cwd: string, repoRoot: string, explicitConfigPath?: string): RuleGenFileConfig {
  const configPath = resolveConfigPath(cwd, repoRoot, explicitConfigPath);

  if (!configPath) {
    return {};
  }

  const source = fs.readFileSync(configPath, 'utf-8');
  const parsed: unknown = yaml.load(source);

  if (parsed === undefined || parsed === null) {
    return {};
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Invalid configuration in ${configPath}: expected YAML object`);
  }

  const doc = new Map<string, unknown>(Object.entries(parsed));
  for (const key of doc.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration in ${configPath}: unknown key "${key}"`);
    }
  }

  const result: RuleGenFileConfig = {};
  for (const key of STRING_KEYS) {
    const value = doc.get(key);
    if (value !== undefined) {
      result[key] = asString(value, key);
    }
  }
  for (const key of LIST_KEYS) {
    const value = doc.get(key);
    if (value !== undefined) {
      result[key] = asStringArray(value, key);
    }
  }

  return result;
}
