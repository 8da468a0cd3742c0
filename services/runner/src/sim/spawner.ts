import { createEnemy } from './entities';
import type { RandomSource } from './ports';
import { addObstaclePair, allocateId, type Session } from './session';
import type { SimSettings } from './settings';

export interface SpawnReport {
  obstaclePair: boolean;
  enemy: boolean;
  /** The enemy timer elapsed but the population was at its cap. */
  enemyCapped: boolean;
}

export function obstacleDue(session: Session, settings: SimSettings, now: number): boolean {
  return now - session.lastObstacleAt > settings.walls.frequencyMs;
}

export function enemyDue(session: Session, settings: SimSettings, now: number): boolean {
  return now - session.lastEnemyAt > settings.enemies.spawnRateMs;
}

export function runSpawns(
  session: Session,
  settings: SimSettings,
  random: RandomSource,
  now: number,
): SpawnReport {
  const report: SpawnReport = { obstaclePair: false, enemy: false, enemyCapped: false };

  if (obstacleDue(session, settings, now)) {
    addObstaclePair(session, settings, random);
    session.lastObstacleAt = now;
    report.obstaclePair = true;
  }

  if (enemyDue(session, settings, now)) {
    if (session.enemies.length < settings.enemies.cap) {
      session.enemies.push(createEnemy(settings, random, allocateId(session)));
      session.lastEnemyAt = now;
      report.enemy = true;
    } else {
      report.enemyCapped = true;
    }
  }

  return report;
}
