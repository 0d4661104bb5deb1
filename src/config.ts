/**
 * Configuration.
 * Reads optional assessment.config.json, otherwise uses defaults.
 * Data path resolves relative to where the process is launched; the knowledge
 * tables ship with the package and resolve relative to this module.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import { reviewRoleSchema } from './types/schemas.js';
import type { PipelineConfig } from './types/index.js';

const configFileSchema = z.object({
  pipeline: z.object({
    confidence_floor: z.number().min(0).max(1),
    required_roles: z.array(reviewRoleSchema).min(1),
  }).partial().optional(),
  negotiation: z.object({
    turn_timeout_ms: z.number().int().positive(),
  }).partial().optional(),
  finance: z.object({
    hourly_rate: z.number().positive(),
    pm_overhead_pct: z.number().min(0),
    manual_baseline_hours: z.number().min(0),
  }).partial().optional(),
  storage: z.object({
    base_path: z.string().min(1),
    knowledge_path: z.string().min(1),
  }).partial().optional(),
});

export type ConfigOverrides = z.infer<typeof configFileSchema>;

function resolveDataPath(): string {
  if (process.env.ASSESSMENT_DATA_PATH) return resolve(process.env.ASSESSMENT_DATA_PATH);
  return resolve(process.cwd(), 'data');
}

/**
 * Priority: ASSESSMENT_KNOWLEDGE_PATH env > data/knowledge beside the package root.
 * Works from both src/ (tests) and dist/ (built), which sit one level below the root.
 */
function resolveKnowledgePath(): string {
  if (process.env.ASSESSMENT_KNOWLEDGE_PATH) return resolve(process.env.ASSESSMENT_KNOWLEDGE_PATH);
  const thisDir = dirname(fileURLToPath(import.meta.url));
  return resolve(thisDir, '..', 'data', 'knowledge');
}

function defaultConfig(): PipelineConfig {
  return {
    pipeline: {
      confidence_floor: 0.6,
      required_roles: ['outcomes_strategist', 'technical_pm', 'legal_counsel', 'document_architect'],
    },
    negotiation: {
      turn_timeout_ms: 30_000,
    },
    finance: {
      hourly_rate: 175,
      pm_overhead_pct: 0.15,
      manual_baseline_hours: 4,
    },
    storage: {
      base_path: resolveDataPath(),
      knowledge_path: resolveKnowledgePath(),
    },
  };
}

let _config: PipelineConfig | null = null;

export function mergeConfig(base: PipelineConfig, overrides: ConfigOverrides): PipelineConfig {
  return {
    pipeline: { ...base.pipeline, ...(overrides.pipeline ?? {}) },
    negotiation: { ...base.negotiation, ...(overrides.negotiation ?? {}) },
    finance: { ...base.finance, ...(overrides.finance ?? {}) },
    storage: { ...base.storage, ...(overrides.storage ?? {}) },
  };
}

export function loadConfig(configPath?: string): PipelineConfig {
  if (_config) return _config;

  const candidates = [
    configPath,
    process.env.ASSESSMENT_CONFIG,
    resolve(process.cwd(), 'assessment.config.json'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  for (const p of candidates) {
    if (!existsSync(p)) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(p, 'utf-8'));
    } catch (err) {
      throw new InvalidInputError(`Config file ${p} is not valid JSON`, { cause: String(err) });
    }
    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidInputError(`Config file ${p} is invalid`, { issues: parsed.error.issues });
    }
    _config = mergeConfig(defaultConfig(), parsed.data);
    return _config;
  }

  _config = defaultConfig();
  return _config;
}

export function getConfig(): PipelineConfig {
  if (!_config) return loadConfig();
  return _config;
}

/** Replace the active config (tests and embedding hosts). */
export function setConfig(overrides: ConfigOverrides = {}): PipelineConfig {
  _config = mergeConfig(defaultConfig(), overrides);
  return _config;
}
