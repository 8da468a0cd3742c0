import 'dotenv/config';

import { closeLogger, makeLogger } from '@cf/logger';

import { loadGameConfig, loadRunnerConfig } from './config';
import { startMetricsServer, type MetricsServerHandle } from './metrics-server';
import { createRunner } from './runner';

const runnerConfig = loadRunnerConfig();
const logger = makeLogger('runner', {
  level: runnerConfig.logLevel ?? undefined,
  dir: runnerConfig.logDir ?? undefined,
});

async function main() {
  logger.info({ configPath: runnerConfig.configPath, level: runnerConfig.level }, 'Loading game configuration');
  const gameConfig = loadGameConfig(runnerConfig.configPath);

  const runner = createRunner({ runnerConfig, gameConfig, logger });

  let metricsServer: MetricsServerHandle | null = null;
  if (runnerConfig.metricsPort !== null) {
    metricsServer = await startMetricsServer(runnerConfig.metricsPort);
    logger.info({ port: runnerConfig.metricsPort }, 'Metrics server listening');
  }

  const controller = new AbortController();
  (['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
    process.once(signal, () => {
      logger.info({ signal }, 'Received shutdown signal, finishing current frame');
      controller.abort();
    });
  });

  try {
    const summary = await runner.run(controller.signal);
    logger.info(
      {
        frames: summary.frames,
        reason: summary.reason,
        sessions: runner.sessions.length,
        bestScore: runner.game.highScore,
      },
      'Run complete',
    );
  } finally {
    if (metricsServer) {
      await metricsServer.close();
    }
  }
}

main()
  .then(() => {
    closeLogger('runner');
  })
  .catch((error) => {
    logger.fatal({ err: error }, 'Runner failed');
    closeLogger('runner');
    process.exitCode = 1;
  });
