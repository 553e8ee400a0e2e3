// Slack app setup

import { App, CustomRoute, LogLevel } from '@slack/bolt';
import { MarketingService } from '../service.js';
import { createLogger } from '../shared/logger.js';
import { SlackMessageHandler } from './handlers.js';

const log = createLogger('SlackApp');

export interface SlackAppConfig {
  botToken: string;
  signingSecret: string;
  // Socket Mode when present, otherwise events arrive over HTTP
  appToken?: string;
  port: number;
  logLevel?: LogLevel;
  customRoutes?: CustomRoute[];
}

export class SlackApp {
  private app: App;
  private handler: SlackMessageHandler;

  constructor(private config: SlackAppConfig, service: MarketingService) {
    const socketMode = Boolean(config.appToken);

    this.app = new App({
      token: config.botToken,
      appToken: config.appToken,
      signingSecret: config.signingSecret,
      socketMode,
      port: config.port,
      // Socket Mode serves custom routes on the installer port
      installerOptions: socketMode ? { port: config.port } : undefined,
      customRoutes: config.customRoutes,
      logLevel: config.logLevel || LogLevel.INFO
    });

    this.handler = new SlackMessageHandler(this.app, service);
    service.setNotifier((userId, text) => this.handler.notify(userId, text));
  }

  async start(): Promise<void> {
    // Set up message handlers
    this.handler.setup();

    await this.app.start();
    log.info(`Bot started (${this.config.appToken ? 'Socket Mode' : 'HTTP'}), routes on port ${this.config.port}`);
  }

  async stop(): Promise<void> {
    await this.app.stop();
    log.info('Bot stopped');
  }
}
