// Chat orchestrator - turns inbound messages into pipeline actions and replies

import { RecordGateway } from '../gateways/records.js';
import { PipelineEngine } from '../pipeline/engine.js';
import { TaskScheduler } from '../scheduler/index.js';
import { describeError, getUserFriendlyError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { Category, Client, ItemRef, PipelineRun, Session } from '../shared/types.js';
import { CATEGORY_MENU, Command, interpret } from './interpreter.js';
import * as replies from './replies.js';
import { SessionManager } from './session.js';

const log = createLogger('Orchestrator');

export interface ChatReply {
  message: string;
  command?: Command['type'];
  clientId?: string;
}

// Pushes an unsolicited message to a client's chat handle
export type Notifier = (handle: string, message: string) => Promise<void>;

export interface ChatOrchestratorOptions {
  displayLimit?: number;
  notifier?: Notifier;
}

interface FollowUp {
  clientId: string;
  handle: string;
}

export class ChatOrchestrator {
  private displayLimit: number;
  private notifier?: Notifier;
  private followUps = new Map<string, FollowUp>();
  private deliveries = new Set<Promise<void>>();

  constructor(
    private records: RecordGateway,
    private engine: PipelineEngine,
    private scheduler: TaskScheduler,
    private sessions: SessionManager,
    options: ChatOrchestratorOptions = {}
  ) {
    this.displayLimit = options.displayLimit ?? 3;
    this.notifier = options.notifier;
    this.scheduler.onRunFinished(run => this.onRunFinished(run));
  }

  setNotifier(notifier: Notifier): void {
    this.notifier = notifier;
  }

  // Main entry point for inbound chat messages; always produces a reply
  async handle(handle: string, text: string, options: { imageUrl?: string } = {}): Promise<ChatReply> {
    try {
      const client = await this.records.findClientByHandle(handle);
      if (!client) {
        return { message: replies.unknownClient() };
      }
      if (client.status !== 'active') {
        return { message: replies.inactiveClient(), clientId: client.id };
      }

      const { session, expired } = this.sessions.getOrCreate(client.id);
      const command = interpret(client, session, text, { imageUrl: options.imageUrl, expired });
      log.debug(`${client.name}: "${text}" -> ${command.type}`);

      const message = await this.execute(client, handle, session, command);
      return { message, command: command.type, clientId: client.id };
    } catch (error) {
      log.error('Failed to handle message:', describeError(error));
      return { message: getUserFriendlyError(error) };
    }
  }

  // Resolves once every pending follow-up message has been sent
  async idle(): Promise<void> {
    while (this.deliveries.size > 0) {
      await Promise.allSettled([...this.deliveries]);
    }
  }

  private async execute(client: Client, handle: string, session: Session, command: Command): Promise<string> {
    switch (command.type) {
      case 'greet': {
        const menu: ItemRef[] = CATEGORY_MENU.map(category => ({ kind: 'category', id: category.id }));
        this.sessions.showList(session, menu);
        return replies.greeting(client);
      }

      case 'cancel':
        this.sessions.reset(session);
        return replies.cancelled();

      case 'show_category':
        return this.showCategory(session, command.category);

      case 'list_pending_posts': {
        const posts = await this.engine.listPendingPosts(client.id, this.displayLimit);
        this.sessions.showList(session, posts.map(post => ({ kind: 'post', id: post.id })));
        return replies.pendingList(posts);
      }

      case 'select_item': {
        if (command.item.kind === 'category') {
          return this.showCategory(session, command.item.id);
        }
        const post = await this.records.getPost(command.item.id);
        if (!post || post.clientId !== client.id || post.status !== 'pending') {
          this.sessions.touch(session);
          return replies.postUnavailable();
        }
        this.sessions.selectPost(session, post.id);
        return replies.postDetail(post, command.ordinal);
      }

      case 'approve': {
        const result = await this.engine.approveAndPublish(client.id, command.postId);
        if (!result.ok) {
          this.sessions.touch(session);
          return result.reason === 'not_eligible' ? replies.postUnavailable() : result.message;
        }
        this.sessions.reset(session);
        return replies.approvalResult(result.post, result.publish);
      }

      case 'reject': {
        const result = await this.engine.rejectPost(client.id, command.postId, command.feedback);
        if (!result.ok) {
          this.sessions.touch(session);
          return result.reason === 'not_eligible' ? replies.postUnavailable() : result.message;
        }
        this.sessions.reset(session);
        return replies.rejected(command.feedback);
      }

      case 'submit_idea': {
        const result = await this.engine.submitIdea(client.id, {
          text: command.text,
          imageUrl: command.imageUrl,
          channel: command.channel
        });
        if (!result.ok) {
          this.sessions.touch(session);
          return result.reason === 'duplicate' ? replies.duplicateIdea() : result.message;
        }

        // Drafting runs in the background; the draft is pushed when it is ready
        const runId = this.scheduler.enqueue(client.id, {
          stages: ['draft'],
          numPosts: 1,
          ideaIds: [result.idea.id]
        });
        this.followUps.set(runId, { clientId: client.id, handle });
        this.sessions.touch(session);
        return replies.ideaReceived();
      }

      case 'unknown':
        this.sessions.touch(session);
        return command.reply;
    }
  }

  private showCategory(session: Session, category: Category): string {
    const entry = CATEGORY_MENU.find(candidate => candidate.id === category);
    if (entry?.available) {
      this.sessions.reset(session);
    } else {
      // Keep the menu on screen so another number can be picked
      this.sessions.touch(session);
    }
    return replies.categoryPrompt(category);
  }

  private onRunFinished(run: PipelineRun): void {
    const followUp = this.followUps.get(run.id);
    if (!followUp) return;
    this.followUps.delete(run.id);

    const delivery = this.sendDraftFollowUp(followUp, run);
    this.deliveries.add(delivery);
    void delivery.finally(() => this.deliveries.delete(delivery));
  }

  private async sendDraftFollowUp(followUp: FollowUp, run: PipelineRun): Promise<void> {
    const notifier = this.notifier;
    if (!notifier) {
      log.warn(`No notifier configured, dropping follow-up for ${followUp.handle}`);
      return;
    }

    try {
      const outcome = run.outcomes.find(candidate => candidate.stage === 'draft');
      const postId = outcome?.itemIds[0];
      const post = postId ? await this.records.getPost(postId) : null;

      await notifier(followUp.handle, post ? replies.draftReady(post) : replies.draftFailed(outcome?.diagnostic));

      // Only a draft the user has actually seen is put up for approval
      if (post) {
        const { session } = this.sessions.getOrCreate(followUp.clientId);
        const shown = this.sessions.showList(session, [{ kind: 'post', id: post.id }]);
        this.sessions.selectPost(shown, post.id);
      }
    } catch (error) {
      log.error(`Follow-up for ${followUp.handle} failed:`, describeError(error));
    }
  }
}
