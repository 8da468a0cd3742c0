/** Monotonic time source in milliseconds. */
export interface Clock {
  now(): number;
}

/** Uniform random number in [0, 1). */
export type RandomSource = () => number;

export type AudioCue = 'flap' | 'enemy' | 'gameover';

export interface AudioPlayer {
  play(cue: AudioCue): void;
}

export interface HighScoreStore {
  load(): number;
  save(value: number): void;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};

export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}
