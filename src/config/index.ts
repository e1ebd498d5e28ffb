import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../games/blackjack/errors.js';
import type { Rules } from '../games/blackjack/types.js';

export const rulesSchema = z.object({
  decks: z.number().int().min(1).max(8).default(6),
  reshuffleThreshold: z.number().min(0).max(1).default(0.2),
  minBet: z.number().int().positive().default(10),
  betMultiple: z.number().int().positive().default(2),
  startingChips: z.number().int().positive().default(100),
  maxPlayers: z.number().int().min(1).max(7).default(6),
  blackjackPayout: z.number().positive().default(1.5),
  insuranceRatio: z.number().min(0).max(1).default(0.5),
  insurancePayout: z.number().positive().default(2),
  doubleAfterSplit: z.boolean().default(true),
  dealerHitsSoft17: z.boolean().default(false),
}).strict();

// other top-level sections are left alone
const fileSchema = z.object({
  rules: z.record(z.unknown()).optional(),
}).passthrough();

export const DEFAULT_RULES: Rules = rulesSchema.parse({});

const FILE = path.resolve(process.cwd(), 'config', 'config.json');
let cached: Rules | null = null;

// For testing: reset the cache
export function resetRulesCache() {
  cached = null;
}

function stripComments(jsonText: string): string {
  // Allow // and /* */ comments in config.json for convenience
  return jsonText
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/^\s*\/\/.*$/gm, '');
}

function readFileRules(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripComments(fs.readFileSync(file, 'utf8')) || '{}');
  } catch (e) {
    throw new ConfigError(`${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const shape = fileSchema.safeParse(parsed);
  if (!shape.success) throw new ConfigError(`${file} must hold an object with an optional "rules" object`);
  return { ...shape.data.rules };
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, number> {
  const out: Record<string, number> = {};
  const num = (key: string, field: keyof Rules) => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return;
    const n = Number(raw);
    if (!Number.isFinite(n)) throw new ConfigError(`${key} must be a number (got "${raw}")`);
    out[field] = n;
  };
  num('BJ_DECKS', 'decks');
  num('BJ_MIN_BET', 'minBet');
  num('BJ_STARTING_CHIPS', 'startingChips');
  num('BJ_RESHUFFLE_THRESHOLD', 'reshuffleThreshold');
  return out;
}

/** Validates a partial rule set, filling in defaults. */
export function parseRules(input: unknown): Rules {
  const result = rulesSchema.safeParse(input ?? {});
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.') || 'rules'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid table rules: ${detail}`);
  }
  if (result.data.minBet % result.data.betMultiple !== 0) {
    throw new ConfigError(`minBet (${result.data.minBet}) must be a multiple of betMultiple (${result.data.betMultiple})`);
  }
  return result.data;
}

/** Rules from config/config.json, then environment overrides. */
export function loadRules(file: string = FILE, env: NodeJS.ProcessEnv = process.env): Rules {
  if (cached && file === FILE && env === process.env) return cached;
  const rules = parseRules({ ...readFileRules(file), ...envOverrides(env) });
  if (file === FILE && env === process.env) cached = rules;
  return rules;
}
