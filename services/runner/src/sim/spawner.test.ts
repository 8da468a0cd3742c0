import { describe, expect, it } from 'vitest';

import { baseConfig, makeSettings, sequenceRandom } from '../../test/helpers';
import { createEnemy, createObstaclePair } from './entities';
import { createSession } from './session';
import { runSpawns } from './spawner';

const settings = makeSettings();
const zero = () => 0;

function counter(start = 1): () => number {
  let next = start;
  return () => next++;
}

describe('obstacle pairs', () => {
  it('places the gap center at the lowest allowed value', () => {
    const pair = createObstaclePair(settings, zero, counter());
    expect(pair.gapCenter).toBe(150);
    expect(pair.top).toMatchObject({ id: 2, pairId: 1, x: 1200, y: 0, height: 75 });
    expect(pair.bottom).toMatchObject({ id: 3, pairId: 1, x: 1200, y: 225, height: 575 });
  });

  it('places the gap center at the highest allowed value', () => {
    const pair = createObstaclePair(settings, () => 0.999999, counter());
    expect(pair.gapCenter).toBe(650);
    expect(pair.top.height).toBe(575);
    expect(pair.bottom.y).toBe(725);
    expect(pair.bottom.height).toBe(75);
  });

  it('keeps the segment heights summing to the window height minus the gap', () => {
    const random = sequenceRandom(0.1, 0.37, 0.5, 0.82, 0.93);
    for (let i = 0; i < 5; i += 1) {
      const pair = createObstaclePair(settings, random, counter());
      expect(pair.top.height + pair.bottom.height).toBe(650);
      expect(pair.bottom.y + pair.bottom.height).toBe(800);
    }
  });

  it('handles an odd gap without a one-pixel drift', () => {
    const odd = makeSettings({ ...baseConfig, walls: { width: 80, gap: 151, speed: 3 } });
    const pair = createObstaclePair(odd, zero, counter());
    expect(pair.top.height).toBe(76);
    expect(pair.bottom.y).toBe(227);
    expect(pair.top.height + 151 + pair.bottom.height).toBe(800);
  });
});

describe('enemies', () => {
  it('spawns at the right edge with a random base line, phase and facing', () => {
    const enemy = createEnemy(settings, sequenceRandom(0.5, 0.2, 0.7), 9);
    expect(enemy).toEqual({
      id: 9,
      x: 1200,
      y: 400,
      width: 50,
      height: 40,
      speed: 4,
      amplitude: 100,
      phase: 2,
      baseY: 400,
      direction: 1,
    });
  });

  it('keeps the base line inside the window', () => {
    expect(createEnemy(settings, zero, 1).baseY).toBe(40);
    expect(createEnemy(settings, () => 0.999999, 1).baseY).toBe(760);
    expect(createEnemy(settings, zero, 1).direction).toBe(-1);
  });
});

describe('runSpawns', () => {
  it('starts a session with one pair and every timer at the start time', () => {
    const session = createSession(settings, zero, 250);
    expect(session.obstacles).toHaveLength(2);
    expect(session.nextId).toBe(4);
    expect(session.lastObstacleAt).toBe(250);
    expect(session.lastEnemyAt).toBe(250);
    expect(session.lastShotAt).toBe(250);
    expect(session.score).toBe(0);
  });

  it('spawns a pair only once strictly more than the frequency has elapsed', () => {
    const session = createSession(settings, zero, 0);

    expect(runSpawns(session, settings, zero, 1500).obstaclePair).toBe(false);
    expect(session.obstacles).toHaveLength(2);

    expect(runSpawns(session, settings, zero, 1501).obstaclePair).toBe(true);
    expect(session.obstacles).toHaveLength(4);
    expect(session.lastObstacleAt).toBe(1501);
  });

  it('stops spawning enemies at the cap without resetting the timer', () => {
    const session = createSession(settings, zero, 0);

    expect(runSpawns(session, settings, zero, 2000).enemy).toBe(false);
    expect(runSpawns(session, settings, zero, 2001)).toEqual({
      obstaclePair: false,
      enemy: true,
      enemyCapped: false,
    });
    expect(runSpawns(session, settings, zero, 4002)).toEqual({
      obstaclePair: true,
      enemy: true,
      enemyCapped: false,
    });
    expect(session.enemies).toHaveLength(2);

    const capped = runSpawns(session, settings, zero, 6003);
    expect(capped.enemy).toBe(false);
    expect(capped.enemyCapped).toBe(true);
    expect(session.enemies).toHaveLength(2);
    expect(session.lastEnemyAt).toBe(4002);

    session.enemies.pop();
    expect(runSpawns(session, settings, zero, 6004).enemy).toBe(true);
    expect(session.lastEnemyAt).toBe(6004);
  });
});
