// Record gateway: typed, rate-limited access to clients, ideas and posts

import Database from 'better-sqlite3';
import { ClientInput, ClientStorage } from '../db/clients.js';
import { IdeaInput, IdeaQuery, IdeaStorage } from '../db/ideas.js';
import { PostInput, PostQuery, PostStorage, PostTransitionFields } from '../db/posts.js';
import { createPermanentError, createTransientError, PipelineError, withRetry } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { RateLimiter } from '../shared/rate-limiter.js';
import { Client, ClientStatus, Idea, IdeaState, Post, PostStatus } from '../shared/types.js';

const log = createLogger('Records');

const SERVICE = 'Record store';

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR']);

export interface RecordGatewayOptions {
  requestsPerSecond?: number;
  maxAttempts?: number;
  initialDelayMs?: number;
}

const toRecordError = (error: unknown): PipelineError => {
  if (error instanceof PipelineError) return error;
  if (error instanceof Database.SqliteError) {
    const baseCode = error.code.split('_').slice(0, 2).join('_');
    return TRANSIENT_SQLITE_CODES.has(baseCode)
      ? createTransientError(SERVICE, undefined, `${error.code}: ${error.message}`)
      : createPermanentError(SERVICE, undefined, `${error.code}: ${error.message}`);
  }
  return createPermanentError(SERVICE, undefined, error instanceof Error ? error.message : String(error));
};

export class RecordGateway {
  private clients: ClientStorage;
  private ideas: IdeaStorage;
  private posts: PostStorage;
  private limiter: RateLimiter;
  private maxAttempts: number;
  private initialDelayMs: number;

  constructor(private db: Database.Database, options: RecordGatewayOptions = {}) {
    this.clients = new ClientStorage(db);
    this.ideas = new IdeaStorage(db);
    this.posts = new PostStorage(db);
    this.limiter = new RateLimiter({ requestsPerWindow: options.requestsPerSecond ?? 5, windowMs: 1000 });
    this.maxAttempts = options.maxAttempts ?? 3;
    this.initialDelayMs = options.initialDelayMs ?? 200;
  }

  // Every store access goes through here
  private call<T>(operation: string, fn: () => T): Promise<T> {
    return withRetry(
      async () => {
        await this.limiter.wait();
        try {
          return fn();
        } catch (error) {
          throw toRecordError(error);
        }
      },
      {
        maxAttempts: this.maxAttempts,
        initialDelayMs: this.initialDelayMs,
        onRetry: (error, attempt, delayMs) =>
          log.warn(`${operation} failed (attempt ${attempt}), retrying in ${delayMs}ms:`, error instanceof Error ? error.message : error)
      }
    );
  }

  // Clients

  getClient(id: string): Promise<Client | null> {
    return this.call('getClient', () => this.clients.get(id));
  }

  findClientByHandle(handle: string): Promise<Client | null> {
    return this.call('findClientByHandle', () => this.clients.findByHandle(handle));
  }

  listClients(): Promise<Client[]> {
    return this.call('listClients', () => this.clients.list());
  }

  listActiveClients(limit?: number): Promise<Client[]> {
    return this.call('listActiveClients', () => {
      const active = this.clients.list('active');
      return limit !== undefined ? active.slice(0, limit) : active;
    });
  }

  upsertClient(input: ClientInput): Promise<Client> {
    return this.call('upsertClient', () => this.clients.upsert(input));
  }

  setClientStatus(id: string, status: ClientStatus): Promise<boolean> {
    return this.call('setClientStatus', () => this.clients.setStatus(id, status));
  }

  // Ideas

  createIdea(clientId: string, input: IdeaInput): Promise<Idea> {
    return this.call('createIdea', () => this.ideas.create(clientId, input));
  }

  getIdea(id: string): Promise<Idea | null> {
    return this.call('getIdea', () => this.ideas.get(id));
  }

  listIdeas(clientId: string, query: IdeaQuery = {}): Promise<Idea[]> {
    return this.call('listIdeas', () => this.ideas.list(clientId, query));
  }

  countIdeas(clientId: string, state?: IdeaState): Promise<number> {
    return this.call('countIdeas', () => this.ideas.count(clientId, state));
  }

  transitionIdea(id: string, from: IdeaState, to: IdeaState): Promise<boolean> {
    return this.call('transitionIdea', () => this.ideas.transition(id, from, to));
  }

  // Marks the idea drafted and inserts its pending post in one transaction.
  // Null when the idea is not the client's or is no longer new.
  createPostFromIdea(clientId: string, input: PostInput): Promise<Post | null> {
    const create = this.db.transaction((): Post | null => {
      const idea = this.ideas.get(input.ideaId);
      if (!idea || idea.clientId !== clientId) return null;
      if (!this.ideas.transition(idea.id, 'new', 'drafted')) return null;
      return this.posts.create(clientId, input);
    });
    return this.call('createPostFromIdea', () => create());
  }

  // Posts

  getPost(id: string): Promise<Post | null> {
    return this.call('getPost', () => this.posts.get(id));
  }

  listPosts(clientId: string, query: PostQuery = {}): Promise<Post[]> {
    return this.call('listPosts', () => this.posts.list(clientId, query));
  }

  countPosts(clientId: string, status?: PostStatus): Promise<number> {
    return this.call('countPosts', () => this.posts.count(clientId, status));
  }

  transitionPost(id: string, from: PostStatus, to: PostStatus, fields: PostTransitionFields = {}): Promise<Post | null> {
    return this.call('transitionPost', () => this.posts.transition(id, from, to, fields));
  }

  // Liveness probe used by the health check
  ping(): Promise<boolean> {
    return this.call('ping', () => this.db.prepare('SELECT 1').get() !== undefined);
  }
}
