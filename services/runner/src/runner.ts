import path from 'node:path';

import { listLevelNames, resolveLevel, type GameConfigT, type LevelRules } from '@cf/game-spec';
import type { Logger } from '@cf/logger';
import seedrandom from 'seedrandom';

import { LoggingAudioPlayer, loadSoundBank } from './audio';
import { AutopilotInput } from './autopilot';
import type { RunnerConfig } from './config';
import { FileHighScoreStore } from './highscore';
import { FrameLoop, type LoopSummary, type Sleep } from './loop';
import { recordSessionEnd } from './metrics';
import { LoggingRenderer } from './render';
import { ArcadeGame, type SessionSummary } from './sim/game';
import { systemClock, type Clock, type HighScoreStore } from './sim/ports';
import { createSimSettings, type SimSettings } from './sim/settings';

export interface RunnerDeps {
  runnerConfig: RunnerConfig;
  gameConfig: GameConfigT;
  logger: Logger;
  clock?: Clock;
  sleep?: Sleep;
  highScores?: HighScoreStore;
}

export interface Runner {
  level: LevelRules;
  settings: SimSettings;
  game: ArcadeGame;
  loop: FrameLoop;
  audio: LoggingAudioPlayer;
  autopilot: AutopilotInput;
  sessions: SessionSummary[];
  run(signal?: AbortSignal): Promise<LoopSummary>;
}

export function createRunner(deps: RunnerDeps): Runner {
  const { runnerConfig, gameConfig, logger } = deps;
  const clock = deps.clock ?? systemClock;

  const level = resolveLevel(gameConfig, runnerConfig.level);
  const settings = createSimSettings(gameConfig, level);
  const random = runnerConfig.seed ? seedrandom(runnerConfig.seed) : seedrandom();

  const bank = loadSoundBank(level.assets.sounds, path.dirname(runnerConfig.configPath), logger);
  const audio = new LoggingAudioPlayer(bank, logger);
  const highScores = deps.highScores ?? new FileHighScoreStore(runnerConfig.highScorePath, logger);

  const sessions: SessionSummary[] = [];
  const game = new ArcadeGame({
    settings,
    clock,
    random,
    audio,
    highScores,
    logger,
    onSessionEnd: (summary) => {
      sessions.push(summary);
      recordSessionEnd(summary.cause, summary.score);
    },
  });

  const autopilot = new AutopilotInput(() => game.snapshot(), settings, { runs: runnerConfig.runs });
  const loop = new FrameLoop({
    game,
    input: autopilot,
    renderer: new LoggingRenderer(logger),
    clock,
    fps: gameConfig.window.fps,
    logger,
    sleep: deps.sleep,
    maxFrames: runnerConfig.maxFrames ?? undefined,
  });

  logger.info(
    {
      level: level.name,
      levelIndex: level.index,
      available: listLevelNames(gameConfig),
      seeded: runnerConfig.seed !== null,
      runs: runnerConfig.runs,
      highScore: game.highScore,
    },
    'Runner ready',
  );

  return {
    level,
    settings,
    game,
    loop,
    audio,
    autopilot,
    sessions,
    run: async (signal) => {
      audio.startMusic();
      return loop.run(signal);
    },
  };
}
