import fs from 'node:fs';
import path from 'node:path';

import type { Logger } from '@cf/logger';

import type { HighScoreStore } from './sim/ports';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Plain-text integer file, one value, no newline. */
export class FileHighScoreStore implements HighScoreStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  load(): number {
    let contents: string;
    try {
      contents = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info({ path: this.filePath }, 'No high score recorded yet');
      } else {
        this.logger.warn({ err: error, path: this.filePath }, 'High score file unreadable, using 0');
      }
      return 0;
    }

    const trimmed = contents.trim();
    if (!/^\d+$/.test(trimmed)) {
      this.logger.warn({ path: this.filePath, contents: trimmed.slice(0, 32) }, 'High score file corrupt, using 0');
      return 0;
    }
    return Number.parseInt(trimmed, 10);
  }

  save(value: number): void {
    const score = Math.max(0, Math.trunc(value));
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tempPath, String(score), 'utf8');
    fs.renameSync(tempPath, this.filePath);
    this.logger.debug({ path: this.filePath, highScore: score }, 'High score saved');
  }
}
