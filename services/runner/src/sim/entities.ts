import { rightEdge, type Body } from './geometry';
import { randomInt, type RandomSource } from './ports';
import type { SimSettings } from './settings';

export interface Player extends Body {
  velocity: number;
}

export type ObstacleSegment = 'top' | 'bottom';

export interface Obstacle extends Body {
  id: number;
  pairId: number;
  segment: ObstacleSegment;
  speed: number;
}

export interface Enemy extends Body {
  id: number;
  speed: number;
  amplitude: number;
  phase: number;
  baseY: number;
  /** Facing only; motion ignores it. */
  direction: -1 | 1;
}

export interface Projectile extends Body {
  id: number;
  speed: number;
}

export interface ObstaclePair {
  gapCenter: number;
  top: Obstacle;
  bottom: Obstacle;
}

export function createPlayer(settings: SimSettings): Player {
  return {
    x: Math.floor(settings.screen.width / 4),
    y: Math.floor(settings.screen.height / 2),
    width: settings.player.width,
    height: settings.player.height,
    velocity: 0,
  };
}

export function createObstaclePair(
  settings: SimSettings,
  random: RandomSource,
  nextId: () => number,
): ObstaclePair {
  const { width: screenWidth, height: screenHeight } = settings.screen;
  const { gap, width, speed } = settings.walls;

  const gapCenter = randomInt(random, gap, screenHeight - gap);
  const topHeight = gapCenter - Math.floor(gap / 2);
  const bottomY = topHeight + gap;
  const pairId = nextId();

  return {
    gapCenter,
    top: {
      id: nextId(),
      pairId,
      segment: 'top',
      x: screenWidth,
      y: 0,
      width,
      height: topHeight,
      speed,
    },
    bottom: {
      id: nextId(),
      pairId,
      segment: 'bottom',
      x: screenWidth,
      y: bottomY,
      width,
      height: screenHeight - bottomY,
      speed,
    },
  };
}

export function createEnemy(settings: SimSettings, random: RandomSource, id: number): Enemy {
  const { height: screenHeight, width: screenWidth } = settings.screen;
  const enemy = settings.enemies;
  const baseY = randomInt(random, enemy.height, screenHeight - enemy.height);

  return {
    id,
    x: screenWidth,
    y: baseY,
    width: enemy.width,
    height: enemy.height,
    speed: enemy.speed,
    amplitude: enemy.amplitude,
    phase: random() * enemy.phaseSpread,
    baseY,
    direction: random() < 0.5 ? -1 : 1,
  };
}

export function createProjectile(settings: SimSettings, player: Player, id: number): Projectile {
  return {
    id,
    x: rightEdge(player),
    y: Math.trunc(player.y) + Math.floor(player.height / 2),
    width: settings.projectiles.width,
    height: settings.projectiles.height,
    speed: settings.projectiles.speed,
  };
}
