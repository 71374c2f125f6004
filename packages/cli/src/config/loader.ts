/**
 * Config loader: smol-toml parsing, section checks, env override, Zod validation.
 *
 * Pipeline: read config.toml -> parse with smol-toml -> detectNestedSections ->
 *           applyEnvOverrides -> LinksignConfigSchema.parse (Zod defaults + validation).
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'smol-toml';
import { z } from 'zod';
import type { Hex } from 'viem';
import { ErrorEncodingEnum } from '@linksign/core';

// ---------------------------------------------------------------------------
// Zod Schema: 3 sections, flat keys, with defaults
// ---------------------------------------------------------------------------

const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*$/;
const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export const LAUNCHER_MODES = ['print', 'open'] as const;
export type LauncherMode = (typeof LAUNCHER_MODES)[number];

export const LinksignConfigSchema = z.object({
  protocol: z
    .object({
      scheme: z.string().regex(SCHEME_PATTERN, 'must be a valid URL scheme').default('linksign'),
      error_encoding: ErrorEncodingEnum.default('symbolic'),
    })
    .default({}),
  signer: z
    .object({
      private_key: z
        .string()
        .refine(
          (value): value is Hex => PRIVATE_KEY_PATTERN.test(value),
          'must be 0x followed by 64 hex characters',
        )
        .optional(),
      chain_id: z.number().int().positive().default(1),
    })
    .default({}),
  launcher: z
    .object({
      mode: z.enum(LAUNCHER_MODES).default('print'),
    })
    .default({}),
});

export type LinksignConfig = z.infer<typeof LinksignConfigSchema>;

const KNOWN_SECTIONS = ['protocol', 'signer', 'launcher'] as const;

function isKnownSection(key: string): boolean {
  return KNOWN_SECTIONS.some((section) => section === key);
}

function isTable(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// detectNestedSections: reject unknown and nested TOML sections
// ---------------------------------------------------------------------------

export function detectNestedSections(parsed: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(parsed)) {
    if (!isKnownSection(key)) {
      throw new Error(
        `Unknown config section '[${key}]'. Allowed sections: ${KNOWN_SECTIONS.join(', ')}`,
      );
    }

    if (!isTable(value)) continue;
    for (const [subKey, subValue] of Object.entries(value)) {
      if (isTable(subValue)) {
        throw new Error(
          `Nested TOML section '[${key}.${subKey}]' detected. ` +
            `linksign config requires flat keys under [${key}].`,
        );
      }
    }
  }
}

// ---------------------------------------------------------------------------
// parseEnvValue: coerce string env values to correct types
// ---------------------------------------------------------------------------

/**
 * Numeric strings become numbers; anything else stays a string.
 */
export function parseEnvValue(value: string): string | number {
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }
  return value;
}

// ---------------------------------------------------------------------------
// applyEnvOverrides: LINKSIGN_{SECTION}_{KEY} -> config override
// ---------------------------------------------------------------------------

/**
 * Apply environment variable overrides. Pattern: LINKSIGN_{SECTION}_{KEY}.
 * The first segment after LINKSIGN_ is the section; the rest joined with '_' is the field.
 * Variables whose section is unknown (LINKSIGN_CONFIG) are skipped.
 */
export function applyEnvOverrides(config: Record<string, unknown>): void {
  for (const [envKey, envValue] of Object.entries(process.env)) {
    if (!envKey.startsWith('LINKSIGN_') || envValue === undefined) continue;

    const parts = envKey.slice('LINKSIGN_'.length).toLowerCase().split('_');
    const section = parts[0];
    if (!section || !isKnownSection(section)) continue;

    const field = parts.slice(1).join('_');
    if (!field) continue;

    const existing = config[section];
    const table: Record<string, unknown> = isTable(existing) ? existing : {};
    table[field] = parseEnvValue(envValue);
    config[section] = table;
  }
}

// ---------------------------------------------------------------------------
// loadConfig: main pipeline
// ---------------------------------------------------------------------------

/**
 * Load config from `configPath`. A missing file yields all defaults.
 *
 * @throws Error for unknown or nested sections, ZodError for invalid values
 */
export function loadConfig(configPath: string): LinksignConfig {
  let raw: Record<string, unknown> = {};

  if (existsSync(configPath)) {
    const content = readFileSync(configPath, 'utf-8');
    if (content.trim().length > 0) {
      raw = parse(content);
    }
  }

  detectNestedSections(raw);
  applyEnvOverrides(raw);
  return LinksignConfigSchema.parse(raw);
}
