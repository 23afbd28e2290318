import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import {
  fractionalDigitsSchema,
  malformedRulePolicySchema,
  miningParamsSchema,
} from '../../application/mining-schema.js';
import type { MiningDefaults } from '../../application/run-settings.js';

/**
 * Schema of config/mining.yaml. Every key is optional; missing keys take
 * the defaults of the original analysis setup.
 */
export const miningConfigSchema = z.object({
  fields: z.object({
    session_key: z.string().min(1).default('Username'),
    action: z.string().min(1).default('Action'),
    timestamp: z.string().min(1).default('DateTime'),
  }).default({}),
  mining: miningParamsSchema.default({}),
  output: z.object({
    malformed_rules: malformedRulePolicySchema.default('keep'),
    fractional_digits: fractionalDigitsSchema.default(3),
    top_k: z.number().int().min(1).default(5),
  }).default({}),
});

export type MiningConfig = MiningDefaults;

export const DEFAULT_MINING_CONFIG: MiningConfig = miningConfigSchema.parse({});

type YamlScalar = string | number | boolean | null;

function parseScalar(raw: string): YamlScalar {
  if (raw === '' || raw === '~' || raw === 'null') return null;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'"))) {
    return raw.length >= 2 ? raw.slice(1, -1) : raw;
  }
  const n = Number(raw);
  return Number.isFinite(n) ? n : raw;
}

/**
 * Minimal YAML reader for the two-level mining config.
 *
 * Handles top-level section keys with indented `key: scalar` lines,
 * comments and blank lines. Not a general-purpose YAML parser.
 */
export function parseSectionedYaml(content: string): Record<string, Record<string, YamlScalar>> {
  const result: Record<string, Record<string, YamlScalar>> = {};
  let section: Record<string, YamlScalar> | undefined;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/\s+#.*$/, '').trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) {
      throw new Error(`Expected "key: value" but got "${line.trim()}"`);
    }

    const key = line.slice(0, colonIdx).trim();
    const value = line.slice(colonIdx + 1).trim();

    // Top-level key (no leading whitespace) opens a section
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      section = {};
      result[key] = section;
      continue;
    }

    if (section === undefined) {
      throw new Error(`Indented key "${key}" appears before any section`);
    }
    section[key] = parseScalar(value);
  }

  return result;
}

/**
 * Loads the mining defaults from YAML.
 *
 * A missing file yields DEFAULT_MINING_CONFIG. A file that exists but does
 * not parse or validate throws: running with silently replaced parameters
 * would produce rules for a configuration nobody asked for.
 */
export function loadMiningConfig(configPath?: string): MiningConfig {
  const filePath = configPath
    ?? process.env['MINING_CONFIG']
    ?? resolve(process.cwd(), 'config', 'mining.yaml');

  if (!existsSync(filePath)) {
    return DEFAULT_MINING_CONFIG;
  }

  const sections = parseSectionedYaml(readFileSync(filePath, 'utf-8'));
  const parsed = miningConfigSchema.safeParse(sections);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid mining config at ${filePath}: ${issues}`);
  }

  return parsed.data;
}
