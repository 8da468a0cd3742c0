import fs from 'node:fs';
import path from 'node:path';

import type { SoundAssetsT } from '@cf/game-spec';
import type { Logger } from '@cf/logger';

import type { AudioCue, AudioPlayer } from './sim/ports';

const CUES: readonly AudioCue[] = ['flap', 'enemy', 'gameover'];

export interface SoundHandle {
  name: string;
  path: string;
}

export interface SoundBank {
  cues: Map<AudioCue, SoundHandle | null>;
  music: SoundHandle | null;
}

function resolveSound(
  name: string,
  relativePath: string | undefined,
  baseDir: string,
  logger: Logger,
): SoundHandle | null {
  if (!relativePath) {
    logger.warn({ sound: name }, 'No asset configured for sound, using silence');
    return null;
  }

  const absolute = path.resolve(baseDir, relativePath);
  if (!fs.existsSync(absolute)) {
    logger.warn({ sound: name, path: absolute }, 'Sound asset missing, using silence');
    return null;
  }

  return { name, path: absolute };
}

export function loadSoundBank(sounds: SoundAssetsT, baseDir: string, logger: Logger): SoundBank {
  const cues = new Map<AudioCue, SoundHandle | null>();
  for (const cue of CUES) {
    cues.set(cue, resolveSound(cue, sounds[cue], baseDir, logger));
  }

  return {
    cues,
    music: resolveSound('background', sounds.background, baseDir, logger),
  };
}

/** Stands in for a mixer when running headless: resolved cues are traced and counted. */
export class LoggingAudioPlayer implements AudioPlayer {
  private readonly plays = new Map<AudioCue, number>();

  constructor(
    private readonly bank: SoundBank,
    private readonly logger: Logger,
  ) {}

  play(cue: AudioCue): void {
    const handle = this.bank.cues.get(cue);
    if (!handle) {
      return;
    }
    this.plays.set(cue, (this.plays.get(cue) ?? 0) + 1);
    this.logger.trace({ cue, path: handle.path }, 'Audio cue');
  }

  startMusic(): boolean {
    if (!this.bank.music) {
      return false;
    }
    this.logger.info({ path: this.bank.music.path }, 'Background music started');
    return true;
  }

  playCount(cue: AudioCue): number {
    return this.plays.get(cue) ?? 0;
  }
}
