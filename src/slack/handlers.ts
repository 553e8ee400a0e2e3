// Slack message handlers

import { App } from '@slack/bolt';
import { MarketingService } from '../service.js';
import { describeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { extractImageUrl, isDirectMessage, stripBotMention, truncate, unwrapLinks } from '../shared/slack.js';

const log = createLogger('Slack');

export interface InboundTurn {
  userId: string;
  channel: string;
  text: string;
  threadTs?: string;
}

export class SlackMessageHandler {
  constructor(
    private app: App,
    private service: MarketingService
  ) {}

  // Set up all message handlers
  setup(): void {
    // Direct messages; the Slack user id is the client's chat handle
    this.app.message(async ({ message }) => {
      // Ignore bot messages and edits to prevent loops
      if (message.subtype !== undefined || message.bot_id || !message.user) {
        return;
      }
      if (!isDirectMessage(message.channel_type, message.channel)) {
        return;
      }

      await this.processTurn({
        userId: message.user,
        channel: message.channel,
        text: message.text ?? ''
      });
    });

    // @mentions in channels reply in a thread
    this.app.event('app_mention', async ({ event }) => {
      if (!event.user) return;
      await this.processTurn({
        userId: event.user,
        channel: event.channel,
        text: stripBotMention(event.text),
        threadTs: event.thread_ts ?? event.ts
      });
    });
  }

  // Runs one chat turn and posts the reply; a failure still gets a reply
  async processTurn(turn: InboundTurn): Promise<void> {
    const text = unwrapLinks(turn.text);
    const imageUrl = extractImageUrl(text);
    const messageText = imageUrl ? text.replace(imageUrl, '').trim() : text;

    log.debug('Turn received:', { user: turn.userId, channel: turn.channel, text: truncate(messageText, 50) });

    let reply: string;
    try {
      const response = await this.service.handleChatMessage(turn.userId, messageText, { imageUrl });
      reply = response.message;
    } catch (error) {
      log.error('Chat turn failed:', describeError(error));
      reply = 'Sorry, something went wrong. Please try again.';
    }

    try {
      await this.app.client.chat.postMessage({
        channel: turn.channel,
        thread_ts: turn.threadTs,
        text: reply
      });
    } catch (error) {
      log.error('Failed to post reply:', describeError(error));
    }
  }

  // Outbound message to a user's DM, used for draft follow-ups
  async notify(userId: string, text: string): Promise<void> {
    await this.app.client.chat.postMessage({ channel: userId, text });
  }
}
