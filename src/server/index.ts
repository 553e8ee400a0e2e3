// Long-running process: Slack app, HTTP routes and periodic session cleanup

import { Config, requireSetting } from '../config.js';
import { closeDatabase, initializeDatabase } from '../db/index.js';
import { MarketingService } from '../service.js';
import { describeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { SlackApp } from '../slack/app.js';
import { createApiRoutes, toCustomRoutes } from './routes.js';

const log = createLogger('Main');

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

export const startServer = async (config: Config): Promise<void> => {
  log.info(`Starting (${config.environment})...`);

  const botToken = requireSetting(config.slack.botToken, 'SLACK_BOT_TOKEN', 'the chat transport');
  const signingSecret = requireSetting(config.slack.signingSecret, 'SLACK_SIGNING_SECRET', 'the chat transport');

  const db = await initializeDatabase({ path: config.database.path });
  log.info('Database initialized');

  const service = new MarketingService(config, db);

  const slackApp = new SlackApp(
    {
      botToken,
      signingSecret,
      appToken: config.slack.appToken,
      port: config.http.port,
      logLevel: config.slack.logLevel,
      customRoutes: toCustomRoutes(createApiRoutes(service))
    },
    service
  );
  await slackApp.start();

  // Periodic session and run cleanup (every 5 minutes)
  const cleanup = setInterval(() => {
    const cleaned = service.cleanupSessions();
    if (cleaned > 0) {
      log.info(`Cleaned up ${cleaned} expired sessions`);
    }
    const pruned = service.pruneRuns();
    if (pruned.runs > 0) {
      log.info(`Forgot ${pruned.runs} finished runs and ${pruned.batches} batches`);
    }
  }, CLEANUP_INTERVAL_MS);

  // Handle graceful shutdown
  const shutdown = async (): Promise<void> => {
    log.info('Shutting down...');
    clearInterval(cleanup);
    await slackApp.stop();
    await service.shutdown();
    closeDatabase();
    log.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      log.error('Shutdown failed:', describeError(error));
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  log.info('Marketing assistant is running');
};
