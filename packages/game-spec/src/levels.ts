import type { GameConfigT, LevelAssetsT } from './index';

export type LevelRules = {
  index: number;
  name: string;
  wallSpeed: number;
  wallFrequencyMs: number;
  enemySpeed: number;
  enemyCap: number;
  backgroundScrollSpeed: number;
  assets: LevelAssetsT;
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function normalizeLevelIndex(index: number, count: number): number {
  if (!Number.isFinite(index)) {
    return 0;
  }
  return clamp(Math.round(index), 0, count - 1);
}

export function resolveLevel(config: GameConfigT, index: number): LevelRules {
  const levelIndex = normalizeLevelIndex(index, config.levels.length);
  const level = config.levels[levelIndex];

  return {
    index: levelIndex,
    name: level.name ?? `Level ${levelIndex + 1}`,
    wallSpeed: config.walls.speed * level.wall_speed_multiplier,
    wallFrequencyMs: level.wall_frequency,
    enemySpeed: config.enemies.speed * level.enemy_speed_multiplier,
    enemyCap: level.enemy_count,
    // the backdrop tracks the base wall speed, not the level-scaled one
    backgroundScrollSpeed: config.walls.speed,
    assets: level.assets,
  };
}

export function listLevelNames(config: GameConfigT): string[] {
  return config.levels.map((level, index) => level.name ?? `Level ${index + 1}`);
}
