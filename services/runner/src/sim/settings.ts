import type { GameConfigT, LevelRules } from '@cf/game-spec';

import type { Rect } from './geometry';

export interface SimSettings {
  title: string;
  screen: { width: number; height: number };
  player: {
    width: number;
    height: number;
    gravity: number;
    flapStrength: number;
    maxVelocity: number;
  };
  walls: { width: number; gap: number; speed: number; frequencyMs: number };
  enemies: {
    width: number;
    height: number;
    speed: number;
    spawnRateMs: number;
    cap: number;
    amplitude: number;
    phaseStep: number;
    phaseSpread: number;
  };
  projectiles: { width: number; height: number; speed: number; cooldownMs: number };
  backgroundScrollSpeed: number;
  startButton: Rect;
}

export function createSimSettings(config: GameConfigT, level: LevelRules): SimSettings {
  const { width, height } = config.window;
  const button = config.ui.start_button;

  return {
    title: config.window.title,
    screen: { width, height },
    player: {
      width: config.player.width,
      height: config.player.height,
      gravity: config.player.gravity,
      flapStrength: config.player.flap_strength,
      maxVelocity: config.player.max_velocity,
    },
    walls: {
      width: config.walls.width,
      gap: config.walls.gap,
      speed: level.wallSpeed,
      frequencyMs: level.wallFrequencyMs,
    },
    enemies: {
      width: config.enemies.width,
      height: config.enemies.height,
      speed: level.enemySpeed,
      spawnRateMs: config.enemies.spawn_rate,
      cap: level.enemyCap,
      amplitude: config.enemies.amplitude,
      phaseStep: config.enemies.phase_step,
      phaseSpread: config.enemies.phase_spread,
    },
    projectiles: {
      width: config.projectiles.width,
      height: config.projectiles.height,
      speed: config.projectiles.speed,
      cooldownMs: config.projectiles.cooldown_ms,
    },
    backgroundScrollSpeed: level.backgroundScrollSpeed,
    startButton: {
      x: Math.floor(width / 2) - Math.floor(button.width / 2),
      y: Math.floor(height / 2) - Math.floor(button.height / 2),
      w: button.width,
      h: button.height,
    },
  };
}
