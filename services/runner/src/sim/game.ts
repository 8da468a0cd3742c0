import type { Logger } from '@cf/logger';

import { advanceScroll } from './background';
import { resolveCollisions, type CollisionCause, type TickOutcome } from './collision';
import { createProjectile, type Enemy, type Obstacle, type Player, type Projectile } from './entities';
import { containsPoint, type Rect } from './geometry';
import { advanceEntities, flap } from './motion';
import type { AudioCue, AudioPlayer, Clock, HighScoreStore, RandomSource } from './ports';
import { allocateId, createSession, type Session } from './session';
import type { SimSettings } from './settings';
import { runSpawns } from './spawner';

export type GamePhase = 'START' | 'PLAYING' | 'GAME_OVER';

export const PRIMARY_BUTTON = 0;
export const FLAP_KEY = 'Space';
export const FIRE_KEY = 'ArrowRight';

export type InputEvent =
  | { type: 'quit' }
  | { type: 'pointer'; x: number; y: number; button: number }
  | { type: 'key'; code: string };

export type GameInput = Exclude<InputEvent, { type: 'quit' }>;

export type InputResult = 'ignored' | 'started' | 'restarted' | 'flapped' | 'fired' | 'fire_rejected';

export interface SessionSummary {
  cause: CollisionCause;
  score: number;
  ticks: number;
  highScore: number;
  newHighScore: boolean;
}

export interface FrameSnapshot {
  phase: GamePhase;
  title: string;
  screen: { width: number; height: number };
  startButton: Rect;
  tick: number;
  player: Readonly<Player>;
  obstacles: ReadonlyArray<Readonly<Obstacle>>;
  enemies: ReadonlyArray<Readonly<Enemy>>;
  projectiles: ReadonlyArray<Readonly<Projectile>>;
  score: number;
  displayScore: number;
  highScore: number;
  backgroundOffset: number;
}

export interface GameDeps {
  settings: SimSettings;
  clock: Clock;
  random: RandomSource;
  audio: AudioPlayer;
  highScores: HighScoreStore;
  logger: Logger;
  onSessionEnd?: (summary: SessionSummary) => void;
}

export class ArcadeGame {
  private readonly settings: SimSettings;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly audio: AudioPlayer;
  private readonly highScores: HighScoreStore;
  private readonly logger: Logger;
  private readonly onSessionEnd?: (summary: SessionSummary) => void;

  private currentPhase: GamePhase = 'START';
  private currentSession: Session;
  private best: number;
  private scrollOffset = 0;

  constructor(deps: GameDeps) {
    this.settings = deps.settings;
    this.clock = deps.clock;
    this.random = deps.random;
    this.audio = deps.audio;
    this.highScores = deps.highScores;
    this.logger = deps.logger;
    this.onSessionEnd = deps.onSessionEnd;

    this.best = this.loadHighScore();
    this.currentSession = createSession(this.settings, this.random, this.clock.now());
  }

  get phase(): GamePhase {
    return this.currentPhase;
  }

  get session(): Session {
    return this.currentSession;
  }

  get highScore(): number {
    return this.best;
  }

  get backgroundOffset(): number {
    return this.scrollOffset;
  }

  handleInput(event: GameInput): InputResult {
    switch (event.type) {
      case 'pointer':
        return this.handlePointer(event.x, event.y, event.button);
      case 'key':
        return this.handleKey(event.code);
    }
  }

  /** One simulation step. Does nothing outside PLAYING. */
  tick(): TickOutcome | null {
    if (this.currentPhase !== 'PLAYING') {
      return null;
    }

    const session = this.currentSession;
    const now = this.clock.now();

    const spawns = runSpawns(session, this.settings, this.random, now);
    if (spawns.obstaclePair || spawns.enemy) {
      this.logger.debug(
        { tick: session.tick, obstaclePair: spawns.obstaclePair, enemy: spawns.enemy },
        'Spawned entities',
      );
    }

    advanceEntities(session, this.settings);
    this.scrollOffset = advanceScroll(this.scrollOffset, this.settings.backgroundScrollSpeed);

    const outcome = resolveCollisions(session, this.settings);
    session.tick += 1;

    if (outcome.collision) {
      if (outcome.collision === 'enemy') {
        this.playCue('enemy');
      }
      this.endSession(outcome.collision);
    }

    return outcome;
  }

  fire(): InputResult {
    if (this.currentPhase !== 'PLAYING') {
      return 'ignored';
    }

    const session = this.currentSession;
    const now = this.clock.now();
    if (now - session.lastShotAt < this.settings.projectiles.cooldownMs) {
      return 'fire_rejected';
    }

    session.projectiles.push(createProjectile(this.settings, session.player, allocateId(session)));
    session.lastShotAt = now;
    return 'fired';
  }

  snapshot(): FrameSnapshot {
    const session = this.currentSession;
    return {
      phase: this.currentPhase,
      title: this.settings.title,
      screen: { ...this.settings.screen },
      startButton: { ...this.settings.startButton },
      tick: session.tick,
      player: { ...session.player },
      obstacles: session.obstacles.map((obstacle) => ({ ...obstacle })),
      enemies: session.enemies.map((enemy) => ({ ...enemy })),
      projectiles: session.projectiles.map((projectile) => ({ ...projectile })),
      score: session.score,
      displayScore: Math.trunc(session.score),
      highScore: this.best,
      backgroundOffset: this.scrollOffset,
    };
  }

  private handlePointer(x: number, y: number, button: number): InputResult {
    if (button !== PRIMARY_BUTTON) {
      return 'ignored';
    }

    if (this.currentPhase === 'START') {
      if (!containsPoint(this.settings.startButton, x, y)) {
        return 'ignored';
      }
      this.beginSession();
      return 'started';
    }

    if (this.currentPhase === 'PLAYING') {
      return this.fire();
    }

    return 'ignored';
  }

  private handleKey(code: string): InputResult {
    if (code === FLAP_KEY) {
      if (this.currentPhase === 'PLAYING') {
        flap(this.currentSession.player, this.settings);
        this.playCue('flap');
        return 'flapped';
      }
      if (this.currentPhase === 'GAME_OVER') {
        this.beginSession();
        return 'restarted';
      }
      return 'ignored';
    }

    if (code === FIRE_KEY) {
      return this.fire();
    }

    return 'ignored';
  }

  private beginSession(): void {
    const previous = this.currentPhase;
    this.currentSession = createSession(this.settings, this.random, this.clock.now());
    this.currentPhase = 'PLAYING';
    this.logger.info({ from: previous, highScore: this.best }, 'Session started');
  }

  private endSession(cause: CollisionCause): void {
    const session = this.currentSession;
    this.currentPhase = 'GAME_OVER';
    this.playCue('gameover');

    const finalScore = Math.trunc(session.score);
    const newHighScore = finalScore > this.best;
    if (newHighScore) {
      this.best = finalScore;
      this.persistHighScore(finalScore);
    }

    const summary: SessionSummary = {
      cause,
      score: finalScore,
      ticks: session.tick,
      highScore: this.best,
      newHighScore,
    };
    this.logger.info(summary, 'Session ended');
    this.onSessionEnd?.(summary);
  }

  private loadHighScore(): number {
    try {
      return this.highScores.load();
    } catch (error) {
      this.logger.warn({ err: error }, 'Could not load high score, starting from 0');
      return 0;
    }
  }

  private persistHighScore(value: number): void {
    try {
      this.highScores.save(value);
    } catch (error) {
      this.logger.warn({ err: error, highScore: value }, 'Could not persist high score');
    }
  }

  private playCue(cue: AudioCue): void {
    try {
      this.audio.play(cue);
    } catch (error) {
      this.logger.warn({ err: error, cue }, 'Audio cue failed');
    }
  }
}
