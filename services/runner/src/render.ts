import type { Logger } from '@cf/logger';

import type { Renderer } from './loop';
import { backgroundTiles } from './sim/background';
import type { FrameSnapshot, GamePhase } from './sim/game';

export const INSTRUCTIONS = [
  'How to Play:',
  'Press SPACE to flap and fly',
  'Navigate through the columns',
  'Press RIGHT ARROW or LEFT CLICK to attack enemies',
  'Destroy enemies for bonus points',
  'Avoid collisions with columns and enemies',
] as const;

/** Text overlay for a frame, top to bottom. */
export function hudLines(frame: FrameSnapshot): string[] {
  switch (frame.phase) {
    case 'START':
      return [frame.title, 'Start Game', ...INSTRUCTIONS];
    case 'PLAYING':
      return [`Score: ${frame.displayScore}`, `High Score: ${frame.highScore}`];
    case 'GAME_OVER':
      return ['Game Over', 'Press SPACE to Restart', `Score: ${frame.displayScore}`];
  }
}

export interface LoggingRendererOptions {
  /** Emit a full scene summary every N frames; 0 disables it. */
  summaryEvery?: number;
}

/**
 * Headless stand-in for a drawing surface: logs the HUD whenever it changes
 * and a periodic scene summary at debug level.
 */
export class LoggingRenderer implements Renderer {
  private readonly summaryEvery: number;
  private lastHud = '';
  private lastPhase: GamePhase | null = null;
  private frames = 0;

  constructor(
    private readonly logger: Logger,
    options: LoggingRendererOptions = {},
  ) {
    this.summaryEvery = Math.max(0, options.summaryEvery ?? 120);
  }

  render(frame: FrameSnapshot): void {
    this.frames += 1;

    const hud = hudLines(frame);
    const joined = hud.join(' | ');
    if (joined !== this.lastHud || frame.phase !== this.lastPhase) {
      this.logger.info({ phase: frame.phase, tick: frame.tick, hud }, 'HUD');
      this.lastHud = joined;
      this.lastPhase = frame.phase;
    }

    if (this.summaryEvery > 0 && this.frames % this.summaryEvery === 0) {
      const [firstTile] = backgroundTiles(frame.backgroundOffset, frame.screen.width, frame.screen.width);
      this.logger.debug(
        {
          phase: frame.phase,
          tick: frame.tick,
          player: { x: frame.player.x, y: Math.round(frame.player.y), velocity: frame.player.velocity },
          obstacles: frame.obstacles.length,
          enemies: frame.enemies.length,
          projectiles: frame.projectiles.length,
          score: frame.score,
          background: firstTile ? { index: firstTile.index, x: firstTile.x, mirrored: firstTile.mirrored } : null,
        },
        'Scene',
      );
    }
  }

  get renderedFrames(): number {
    return this.frames;
  }
}
