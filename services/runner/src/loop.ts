import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from '@cf/logger';

import { recordFrame } from './metrics';
import type { TickOutcome } from './sim/collision';
import type { ArcadeGame, FrameSnapshot, InputEvent, InputResult } from './sim/game';
import type { Clock } from './sim/ports';

export interface InputSource {
  /** Events received since the previous call, oldest first. */
  drain(): InputEvent[];
}

export interface Renderer {
  render(frame: FrameSnapshot): void;
}

export type Sleep = (ms: number) => Promise<void>;

export interface FrameLoopOptions {
  game: ArcadeGame;
  input: InputSource;
  renderer: Renderer;
  clock: Clock;
  fps: number;
  logger: Logger;
  sleep?: Sleep;
  maxFrames?: number;
}

export interface FrameResult {
  quit: boolean;
  inputs: InputResult[];
  outcome: TickOutcome | null;
}

export type LoopStopReason = 'quit' | 'aborted' | 'frame_limit';

export interface LoopSummary {
  frames: number;
  reason: LoopStopReason;
}

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export class FrameLoop {
  private readonly game: ArcadeGame;
  private readonly input: InputSource;
  private readonly renderer: Renderer;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly maxFrames: number | null;

  readonly frameIntervalMs: number;
  private frames = 0;

  constructor(options: FrameLoopOptions) {
    if (!Number.isFinite(options.fps) || options.fps <= 0) {
      throw new Error(`fps must be a positive number, got ${options.fps}`);
    }

    this.game = options.game;
    this.input = options.input;
    this.renderer = options.renderer;
    this.clock = options.clock;
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.maxFrames = options.maxFrames ?? null;
    this.frameIntervalMs = 1000 / options.fps;
  }

  get frameCount(): number {
    return this.frames;
  }

  /** input → simulate → render, without pacing. */
  runFrame(): FrameResult {
    let quit = false;
    const inputs: InputResult[] = [];

    for (const event of this.input.drain()) {
      if (event.type === 'quit') {
        quit = true;
        continue;
      }
      inputs.push(this.game.handleInput(event));
    }

    const outcome = this.game.tick();
    this.renderer.render(this.game.snapshot());
    this.frames += 1;

    return { quit, inputs, outcome };
  }

  async run(signal?: AbortSignal): Promise<LoopSummary> {
    this.logger.info({ fps: 1000 / this.frameIntervalMs, maxFrames: this.maxFrames }, 'Frame loop started');

    const reason = await this.drive(signal);

    this.logger.info({ frames: this.frames, reason }, 'Frame loop stopped');
    return { frames: this.frames, reason };
  }

  private async drive(signal?: AbortSignal): Promise<LoopStopReason> {
    for (;;) {
      if (signal?.aborted) {
        return 'aborted';
      }
      if (this.maxFrames !== null && this.frames >= this.maxFrames) {
        return 'frame_limit';
      }

      const startedAt = this.clock.now();
      const { quit } = this.runFrame();
      const workMs = this.clock.now() - startedAt;
      recordFrame(this.game.phase, workMs, this.frameIntervalMs);

      if (quit) {
        return 'quit';
      }

      const remaining = this.frameIntervalMs - workMs;
      if (remaining > 0) {
        await this.sleep(remaining);
      } else {
        this.logger.debug({ frame: this.frames, workMs }, 'Frame overran its interval');
      }
    }
  }
}
