import 'dotenv/config';

import fs from 'node:fs';
import path from 'node:path';

import { ConfigError, parseGameConfig, type GameConfigT } from '@cf/game-spec';
import { z } from 'zod';

const DEFAULT_CONFIG_PATH = './levels.json';
const DEFAULT_HIGHSCORE_PATH = './highscore.txt';

const EnvSchema = z.object({
  CONFIG_PATH: z.string().optional(),
  HIGHSCORE_PATH: z.string().optional(),
  LEVEL: z.string().optional(),
  SEED: z.string().optional(),
  RUNS: z.string().optional(),
  MAX_FRAMES: z.string().optional(),
  METRICS_PORT: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  LOG_DIR: z.string().optional(),
});

export interface RunnerConfig {
  configPath: string;
  highScorePath: string;
  level: number;
  seed: string | null;
  runs: number;
  maxFrames: number | null;
  metricsPort: number | null;
  logLevel: string | null;
  logDir: string | null;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseOptionalPositive(value: string | undefined): number | null {
  const parsed = parseInteger(value?.trim(), 0);
  return parsed > 0 ? parsed : null;
}

function optionalText(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

function normalisePath(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim() ?? '';
  return path.resolve(trimmed.length > 0 ? trimmed : fallback);
}

export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = EnvSchema.parse(env);
  const logDir = optionalText(parsed.LOG_DIR);

  return {
    configPath: normalisePath(parsed.CONFIG_PATH, DEFAULT_CONFIG_PATH),
    highScorePath: normalisePath(parsed.HIGHSCORE_PATH, DEFAULT_HIGHSCORE_PATH),
    level: Math.max(0, parseInteger(parsed.LEVEL, 0)),
    seed: optionalText(parsed.SEED),
    runs: Math.max(1, parseInteger(parsed.RUNS, 3)),
    maxFrames: parseOptionalPositive(parsed.MAX_FRAMES),
    metricsPort: parseOptionalPositive(parsed.METRICS_PORT),
    logLevel: optionalText(parsed.LOG_LEVEL),
    logDir: logDir === null ? null : path.resolve(logDir),
  };
}

/** Reads and validates the game rules file. Any failure is a ConfigError. */
export function loadGameConfig(filePath: string): GameConfigT {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read game configuration at ${filePath}: ${reason}`, []);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Game configuration at ${filePath} is not valid JSON: ${reason}`, []);
  }

  return parseGameConfig(json);
}
