import { describe, expect, it } from 'vitest';

import { ManualClock, MemoryHighScores, RecordingAudio, makeSettings, silentLogger } from '../../test/helpers';
import type { Enemy } from './entities';
import { ArcadeGame, FIRE_KEY, FLAP_KEY, PRIMARY_BUTTON, type SessionSummary } from './game';
import type { AudioPlayer, HighScoreStore } from './ports';

const settings = makeSettings();

interface Harness {
  game: ArcadeGame;
  clock: ManualClock;
  audio: RecordingAudio;
  highScores: MemoryHighScores;
  summaries: SessionSummary[];
}

function setup(options: { highScore?: number; audio?: AudioPlayer; highScores?: HighScoreStore } = {}): Harness {
  const clock = new ManualClock(0);
  const audio = new RecordingAudio();
  const highScores = new MemoryHighScores(options.highScore ?? 5);
  const summaries: SessionSummary[] = [];
  const game = new ArcadeGame({
    settings,
    clock,
    random: () => 0.5,
    audio: options.audio ?? audio,
    highScores: options.highScores ?? highScores,
    logger: silentLogger(),
    onSessionEnd: (summary) => summaries.push(summary),
  });
  return { game, clock, audio, highScores, summaries };
}

function start(game: ArcadeGame): void {
  expect(game.handleInput({ type: 'pointer', x: 600, y: 400, button: PRIMARY_BUTTON })).toBe('started');
}

function crashIntoFloor(game: ArcadeGame): void {
  game.session.player.y = 760;
  game.tick();
}

function stationaryEnemy(id: number, x: number, y: number): Enemy {
  return { id, x, y, width: 50, height: 40, speed: 4, amplitude: 0, phase: 0, baseY: y, direction: -1 };
}

describe('ArcadeGame', () => {
  it('waits on the start screen with the stored high score', () => {
    const { game } = setup();
    expect(game.phase).toBe('START');
    expect(game.highScore).toBe(5);
    expect(game.tick()).toBeNull();
    expect(game.session.player.y).toBe(400);
    expect(game.backgroundOffset).toBe(0);
  });

  it('ignores flap and fire on the start screen', () => {
    const { game, audio } = setup();
    expect(game.handleInput({ type: 'key', code: FLAP_KEY })).toBe('ignored');
    expect(game.handleInput({ type: 'key', code: FIRE_KEY })).toBe('ignored');
    expect(game.phase).toBe('START');
    expect(game.session.player.velocity).toBe(0);
    expect(audio.cues).toEqual([]);
  });

  it('starts only on a primary click inside the start button', () => {
    const { game } = setup();
    expect(game.handleInput({ type: 'pointer', x: 100, y: 100, button: PRIMARY_BUTTON })).toBe('ignored');
    expect(game.handleInput({ type: 'pointer', x: 600, y: 400, button: 2 })).toBe('ignored');
    expect(game.phase).toBe('START');
    start(game);
    expect(game.phase).toBe('PLAYING');
  });

  it('flaps while playing and plays the flap cue', () => {
    const { game, audio } = setup();
    start(game);
    expect(game.handleInput({ type: 'key', code: FLAP_KEY })).toBe('flapped');
    expect(game.session.player.velocity).toBe(-8);
    expect(audio.cues).toEqual(['flap']);
    expect(game.handleInput({ type: 'key', code: 'KeyQ' })).toBe('ignored');
  });

  it('enforces the fire cooldown from the session start', () => {
    const { game, clock } = setup();
    start(game);

    clock.time = 499;
    expect(game.handleInput({ type: 'key', code: FIRE_KEY })).toBe('fire_rejected');

    clock.time = 500;
    expect(game.handleInput({ type: 'key', code: FIRE_KEY })).toBe('fired');
    expect(game.session.projectiles).toHaveLength(1);
    expect(game.session.projectiles[0]).toMatchObject({ x: 360, y: 422, width: 20, height: 10 });

    clock.time = 999;
    expect(game.handleInput({ type: 'pointer', x: 10, y: 10, button: PRIMARY_BUTTON })).toBe('fire_rejected');

    clock.time = 1000;
    expect(game.handleInput({ type: 'pointer', x: 10, y: 10, button: PRIMARY_BUTTON })).toBe('fired');
    expect(game.session.projectiles).toHaveLength(2);
  });

  it('ends the session when the player hits the floor', () => {
    const { game, audio, highScores, summaries } = setup();
    start(game);

    game.session.player.y = 760;
    const outcome = game.tick();

    expect(outcome?.collision).toBe('bounds');
    expect(game.phase).toBe('GAME_OVER');
    expect(audio.cues).toEqual(['gameover']);
    expect(highScores.saves).toEqual([]);
    expect(summaries).toEqual([{ cause: 'bounds', score: 0, ticks: 1, highScore: 5, newHighScore: false }]);
  });

  it('stores a beaten high score using the truncated score', () => {
    const { game, highScores, summaries } = setup();
    start(game);
    game.session.score = 7.5;
    crashIntoFloor(game);

    expect(game.highScore).toBe(7);
    expect(highScores.saves).toEqual([7]);
    expect(summaries[0]).toMatchObject({ score: 7, highScore: 7, newHighScore: true });
  });

  it('counts points scored on the crash tick toward the high score', () => {
    const { game, highScores, summaries } = setup({ highScore: 0 });
    start(game);
    const session = game.session;
    session.obstacles.forEach((obstacle) => {
      obstacle.x = -90;
    });
    session.enemies.push(stationaryEnemy(98, 704, 300));
    session.projectiles.push({ id: 97, x: 680, y: 310, width: 20, height: 10, speed: 10 });
    session.player.y = 760;

    game.tick();

    expect(game.phase).toBe('GAME_OVER');
    expect(session.score).toBe(3);
    expect(session.obstacles).toEqual([]);
    expect(session.enemies).toEqual([]);
    expect(highScores.saves).toEqual([3]);
    expect(summaries[0]).toMatchObject({ cause: 'bounds', score: 3, newHighScore: true });
  });

  it('keeps the high score when the truncated score only ties it', () => {
    const { game, highScores } = setup();
    start(game);
    game.session.score = 5.5;
    crashIntoFloor(game);

    expect(game.highScore).toBe(5);
    expect(highScores.saves).toEqual([]);
  });

  it('plays the enemy cue before the game over cue on an enemy hit', () => {
    const { game, audio, summaries } = setup();
    start(game);
    game.session.enemies.push(stationaryEnemy(99, 304, 400));
    game.tick();

    expect(audio.cues).toEqual(['enemy', 'gameover']);
    expect(summaries[0].cause).toBe('enemy');
  });

  it('restarts into a fresh session on space after game over', () => {
    const { game, clock } = setup();
    start(game);
    clock.time = 600;
    game.handleInput({ type: 'key', code: FIRE_KEY });
    game.session.score = 3;
    crashIntoFloor(game);

    expect(game.handleInput({ type: 'key', code: FIRE_KEY })).toBe('ignored');
    expect(game.handleInput({ type: 'pointer', x: 600, y: 400, button: PRIMARY_BUTTON })).toBe('ignored');

    clock.time = 1234;
    expect(game.handleInput({ type: 'key', code: FLAP_KEY })).toBe('restarted');

    const session = game.session;
    expect(game.phase).toBe('PLAYING');
    expect(session.score).toBe(0);
    expect(session.obstacles).toHaveLength(2);
    expect(session.enemies).toEqual([]);
    expect(session.projectiles).toEqual([]);
    expect(session.player).toEqual({ x: 300, y: 400, width: 60, height: 45, velocity: 0 });
    expect(session.lastObstacleAt).toBe(1234);
    expect(session.lastEnemyAt).toBe(1234);
    expect(session.lastShotAt).toBe(1234);
    expect(game.highScore).toBe(5);
  });

  it('scrolls the background only while playing', () => {
    const { game } = setup();
    game.tick();
    expect(game.backgroundOffset).toBe(0);

    start(game);
    game.tick();
    game.tick();
    expect(game.backgroundOffset).toBe(6);

    crashIntoFloor(game);
    expect(game.backgroundOffset).toBe(9);
    expect(game.tick()).toBeNull();
    expect(game.backgroundOffset).toBe(9);
  });

  it('keeps simulating when audio playback throws', () => {
    const broken: AudioPlayer = {
      play: () => {
        throw new Error('device busy');
      },
    };
    const { game } = setup({ audio: broken });
    start(game);

    expect(game.handleInput({ type: 'key', code: FLAP_KEY })).toBe('flapped');
    expect(game.session.player.velocity).toBe(-8);
    crashIntoFloor(game);
    expect(game.phase).toBe('GAME_OVER');
  });

  it('falls back to zero when the high score cannot be read and survives a failed save', () => {
    const store: HighScoreStore = {
      load: () => {
        throw new Error('unreadable');
      },
      save: () => {
        throw new Error('read-only');
      },
    };
    const { game, summaries } = setup({ highScores: store });
    expect(game.highScore).toBe(0);

    start(game);
    game.session.score = 2;
    crashIntoFloor(game);

    expect(game.highScore).toBe(2);
    expect(summaries[0].newHighScore).toBe(true);
  });

  it('hands out snapshots that do not alias the live session', () => {
    const { game } = setup();
    start(game);
    game.session.score = 7.5;

    const frame = game.snapshot();
    expect(frame.displayScore).toBe(7);
    expect(frame.score).toBe(7.5);
    expect(frame.startButton).toEqual({ x: 480, y: 360, w: 240, h: 80 });

    game.session.player.y = 10;
    game.session.obstacles.pop();
    expect(frame.player.y).toBe(400);
    expect(frame.obstacles).toHaveLength(2);
  });
});
