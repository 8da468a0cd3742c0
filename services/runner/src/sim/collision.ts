import { bodiesOverlap, bottomEdge, boxOf, rightEdge } from './geometry';
import type { Session } from './session';
import type { SimSettings } from './settings';

export const OBSTACLE_CLEAR_SCORE = 0.5;
export const ENEMY_KILL_SCORE = 2;

export type CollisionCause = 'obstacle' | 'enemy' | 'bounds';

export interface TickOutcome {
  collision: CollisionCause | null;
  clearedObstacles: number;
  escapedEnemies: number;
  expiredProjectiles: number;
  kills: number;
  scoreGained: number;
}

export function detectPlayerCollision(session: Session, settings: SimSettings): CollisionCause | null {
  const { player } = session;

  if (session.obstacles.some((obstacle) => bodiesOverlap(player, obstacle))) {
    return 'obstacle';
  }

  if (session.enemies.some((enemy) => bodiesOverlap(player, enemy))) {
    return 'enemy';
  }

  if (Math.trunc(player.y) <= 0 || bottomEdge(player) >= settings.screen.height) {
    return 'bounds';
  }

  return null;
}

function cullObstacles(session: Session): number {
  const cleared = new Set<number>();
  for (const obstacle of session.obstacles) {
    if (rightEdge(obstacle) < 0) {
      cleared.add(obstacle.id);
    }
  }
  if (cleared.size > 0) {
    session.obstacles = session.obstacles.filter((obstacle) => !cleared.has(obstacle.id));
  }
  return cleared.size;
}

function cullEnemies(session: Session): number {
  const escaped = new Set<number>();
  for (const enemy of session.enemies) {
    if (rightEdge(enemy) < 0) {
      escaped.add(enemy.id);
    }
  }
  if (escaped.size > 0) {
    session.enemies = session.enemies.filter((enemy) => !escaped.has(enemy.id));
  }
  return escaped.size;
}

function resolveProjectiles(session: Session, settings: SimSettings): { expired: number; kills: number } {
  const spent = new Set<number>();
  const consumed = new Set<number>();
  let expired = 0;

  for (const projectile of session.projectiles) {
    if (boxOf(projectile).x > settings.screen.width) {
      spent.add(projectile.id);
      expired += 1;
      continue;
    }

    const target = session.enemies.find(
      (enemy) => !consumed.has(enemy.id) && bodiesOverlap(projectile, enemy),
    );
    if (target) {
      consumed.add(target.id);
      spent.add(projectile.id);
    }
  }

  if (spent.size > 0) {
    session.projectiles = session.projectiles.filter((projectile) => !spent.has(projectile.id));
  }
  if (consumed.size > 0) {
    session.enemies = session.enemies.filter((enemy) => !consumed.has(enemy.id));
  }

  return { expired, kills: consumed.size };
}

/**
 * Culls obstacles, enemies and projectiles and scores them, then checks the
 * player against what is left. Points earned on a crash tick still count.
 */
export function resolveCollisions(session: Session, settings: SimSettings): TickOutcome {
  const clearedObstacles = cullObstacles(session);
  const escapedEnemies = cullEnemies(session);
  const { expired, kills } = resolveProjectiles(session, settings);

  const scoreGained = clearedObstacles * OBSTACLE_CLEAR_SCORE + kills * ENEMY_KILL_SCORE;
  session.score += scoreGained;

  return {
    collision: detectPlayerCollision(session, settings),
    clearedObstacles,
    escapedEnemies,
    expiredProjectiles: expired,
    kills,
    scoreGained,
  };
}
