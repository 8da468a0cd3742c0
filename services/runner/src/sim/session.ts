import { createObstaclePair, createPlayer, type Enemy, type Obstacle, type Player, type Projectile } from './entities';
import type { RandomSource } from './ports';
import type { SimSettings } from './settings';

export interface Session {
  player: Player;
  obstacles: Obstacle[];
  enemies: Enemy[];
  projectiles: Projectile[];
  score: number;
  lastObstacleAt: number;
  lastEnemyAt: number;
  lastShotAt: number;
  tick: number;
  nextId: number;
}

export function allocateId(session: Session): number {
  const id = session.nextId;
  session.nextId += 1;
  return id;
}

export function addObstaclePair(session: Session, settings: SimSettings, random: RandomSource): number {
  const pair = createObstaclePair(settings, random, () => allocateId(session));
  session.obstacles.push(pair.top, pair.bottom);
  return pair.gapCenter;
}

/** Fresh session with one obstacle pair already on screen and every timer at `now`. */
export function createSession(settings: SimSettings, random: RandomSource, now: number): Session {
  const session: Session = {
    player: createPlayer(settings),
    obstacles: [],
    enemies: [],
    projectiles: [],
    score: 0,
    lastObstacleAt: now,
    lastEnemyAt: now,
    lastShotAt: now,
    tick: 0,
    nextId: 1,
  };
  addObstaclePair(session, settings, random);
  return session;
}
