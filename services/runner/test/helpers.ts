import { parseGameConfig, resolveLevel, type GameConfigInput } from '@cf/game-spec';
import pino from 'pino';

import type { AudioCue, AudioPlayer, Clock, HighScoreStore, RandomSource } from '../src/sim/ports';
import { createSimSettings, type SimSettings } from '../src/sim/settings';

export const baseConfig: GameConfigInput = {
  window: { width: 1200, height: 800, fps: 60, title: 'Column Flight' },
  player: { width: 60, height: 45, gravity: 0.5, flap_strength: -8, max_velocity: 10 },
  walls: { width: 80, gap: 150, speed: 3 },
  enemies: { width: 50, height: 40, speed: 4, spawn_rate: 2000 },
  levels: [
    { wall_speed_multiplier: 1, enemy_speed_multiplier: 1, enemy_count: 2, wall_frequency: 1500 },
  ],
};

export function makeSettings(config: GameConfigInput = baseConfig): SimSettings {
  const parsed = parseGameConfig(config);
  return createSimSettings(parsed, resolveLevel(parsed, 0));
}

export class ManualClock implements Clock {
  constructor(public time = 0) {}

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

/** Cycles through the given values. */
export function sequenceRandom(...values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value;
  };
}

export function silentLogger() {
  return pino({ level: 'silent' });
}

export class MemoryHighScores implements HighScoreStore {
  readonly saves: number[] = [];

  constructor(public value = 0) {}

  load(): number {
    return this.value;
  }

  save(value: number): void {
    this.value = value;
    this.saves.push(value);
  }
}

export class RecordingAudio implements AudioPlayer {
  readonly cues: AudioCue[] = [];

  play(cue: AudioCue): void {
    this.cues.push(cue);
  }
}
