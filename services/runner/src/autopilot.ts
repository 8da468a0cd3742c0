import type { InputSource } from './loop';
import { FIRE_KEY, FLAP_KEY, PRIMARY_BUTTON, type FrameSnapshot, type GamePhase, type InputEvent } from './sim/game';
import type { SimSettings } from './sim/settings';

export interface AutopilotOptions {
  /** Sessions to play before sending quit. */
  runs: number;
  /** Pixels below the gap center tolerated before flapping. */
  flapMargin?: number;
  /** Never flap while the player's top is above this line. */
  ceiling?: number;
}

/**
 * Scripted player for headless runs: clicks start, follows the next gap,
 * shoots enemies in line and restarts until the run budget is spent.
 */
export class AutopilotInput implements InputSource {
  private readonly runs: number;
  private readonly flapMargin: number;
  private readonly ceiling: number;
  private previousPhase: GamePhase | null = null;
  private finishedRuns = 0;

  constructor(
    private readonly observe: () => FrameSnapshot,
    private readonly settings: SimSettings,
    options: AutopilotOptions,
  ) {
    this.runs = Math.max(1, options.runs);
    this.flapMargin = options.flapMargin ?? 12;
    this.ceiling = options.ceiling ?? settings.player.height;
  }

  get completedRuns(): number {
    return this.finishedRuns;
  }

  drain(): InputEvent[] {
    const frame = this.observe();
    if (this.previousPhase === 'PLAYING' && frame.phase === 'GAME_OVER') {
      this.finishedRuns += 1;
    }
    this.previousPhase = frame.phase;

    switch (frame.phase) {
      case 'START': {
        const button = frame.startButton;
        return [
          {
            type: 'pointer',
            x: button.x + Math.floor(button.w / 2),
            y: button.y + Math.floor(button.h / 2),
            button: PRIMARY_BUTTON,
          },
        ];
      }
      case 'GAME_OVER':
        return this.finishedRuns >= this.runs ? [{ type: 'quit' }] : [{ type: 'key', code: FLAP_KEY }];
      case 'PLAYING':
        return this.steer(frame);
    }
  }

  private steer(frame: FrameSnapshot): InputEvent[] {
    const events: InputEvent[] = [];
    const { player } = frame;

    const targetY = this.nextGapCenter(frame) ?? frame.screen.height / 2;
    const centerY = player.y + player.height / 2;
    const sinking = player.velocity >= 0 && centerY + player.velocity > targetY + this.flapMargin;
    if (sinking && player.y > this.ceiling) {
      events.push({ type: 'key', code: FLAP_KEY });
    }

    if (this.enemyInLine(frame)) {
      events.push({ type: 'key', code: FIRE_KEY });
    }

    return events;
  }

  private nextGapCenter(frame: FrameSnapshot): number | null {
    const playerLeft = frame.player.x;
    let nearest: { x: number; top: number } | null = null;

    for (const obstacle of frame.obstacles) {
      if (obstacle.segment !== 'bottom' || obstacle.x + obstacle.width < playerLeft) {
        continue;
      }
      if (!nearest || obstacle.x < nearest.x) {
        nearest = { x: obstacle.x, top: obstacle.y };
      }
    }

    return nearest ? nearest.top - this.settings.walls.gap / 2 : null;
  }

  private enemyInLine(frame: FrameSnapshot): boolean {
    const { player } = frame;
    const shotTop = Math.trunc(player.y) + Math.floor(player.height / 2);
    const shotBottom = shotTop + this.settings.projectiles.height;

    return frame.enemies.some(
      (enemy) => enemy.x > player.x + player.width && shotBottom > enemy.y && shotTop < enemy.y + enemy.height,
    );
  }
}
