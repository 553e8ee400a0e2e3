// Post storage

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { Channel, isChannel, Post, PostStatus } from '../shared/types.js';

interface PostRow {
  id: string;
  client_id: string;
  idea_id: string;
  body: string;
  channel: string;
  media_url: string | null;
  status: string;
  feedback: string | null;
  error: string | null;
  platform_post_id: string | null;
  attempts: number;
  created_at: string;
  updated_at: string;
  published_at: string | null;
}

export interface PostInput {
  ideaId: string;
  body: string;
  channel: Channel;
  mediaUrl?: string;
}

export interface PostQuery {
  status?: PostStatus;
  ids?: string[];
  limit?: number;
}

// Fields written alongside a status transition
export interface PostTransitionFields {
  feedback?: string;
  error?: string | null;
  platformPostId?: string;
  publishedAt?: string;
  attempts?: number;
}

const POST_STATUSES: readonly PostStatus[] = ['pending', 'approved', 'rejected', 'published', 'failed'];

const toPostStatus = (value: string): PostStatus =>
  POST_STATUSES.find(status => status === value) ?? 'failed';

export class PostStorage {
  constructor(private db: Database.Database) {}

  create(clientId: string, input: PostInput): Post {
    const now = new Date().toISOString();
    const post: Post = {
      id: randomUUID(),
      clientId,
      ideaId: input.ideaId,
      body: input.body,
      channel: input.channel,
      mediaUrl: input.mediaUrl,
      status: 'pending',
      attempts: 0,
      createdAt: now,
      updatedAt: now
    };

    this.db.prepare(`
      INSERT INTO posts
      (id, client_id, idea_id, body, channel, media_url, status, attempts, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      post.id,
      post.clientId,
      post.ideaId,
      post.body,
      post.channel,
      post.mediaUrl ?? null,
      post.status,
      post.attempts,
      post.createdAt,
      post.updatedAt
    );

    return post;
  }

  get(id: string): Post | null {
    const row = this.db.prepare<[string], PostRow>('SELECT * FROM posts WHERE id = ?').get(id);
    return row ? this.rowToPost(row) : null;
  }

  // Oldest first, by insertion order
  list(clientId: string, query: PostQuery = {}): Post[] {
    const clauses = ['client_id = ?'];
    const params: Array<string | number> = [clientId];

    if (query.status) {
      clauses.push('status = ?');
      params.push(query.status);
    }
    if (query.ids) {
      if (query.ids.length === 0) return [];
      clauses.push(`id IN (${query.ids.map(() => '?').join(', ')})`);
      params.push(...query.ids);
    }

    let sql = `SELECT * FROM posts WHERE ${clauses.join(' AND ')} ORDER BY rowid`;
    if (query.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    return this.db
      .prepare<Array<string | number>, PostRow>(sql)
      .all(...params)
      .map(row => this.rowToPost(row));
  }

  count(clientId: string, status?: PostStatus): number {
    const row = status
      ? this.db
          .prepare<[string, string], { total: number }>('SELECT COUNT(*) AS total FROM posts WHERE client_id = ? AND status = ?')
          .get(clientId, status)
      : this.db
          .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM posts WHERE client_id = ?')
          .get(clientId);
    return row?.total ?? 0;
  }

  // Compare-and-set on status; null when another writer got there first
  transition(id: string, from: PostStatus, to: PostStatus, fields: PostTransitionFields = {}): Post | null {
    const sets = ['status = ?', 'updated_at = ?'];
    const params: Array<string | number | null> = [to, new Date().toISOString()];

    if (fields.feedback !== undefined) {
      sets.push('feedback = ?');
      params.push(fields.feedback);
    }
    if (fields.error !== undefined) {
      sets.push('error = ?');
      params.push(fields.error);
    }
    if (fields.platformPostId !== undefined) {
      sets.push('platform_post_id = ?');
      params.push(fields.platformPostId);
    }
    if (fields.publishedAt !== undefined) {
      sets.push('published_at = ?');
      params.push(fields.publishedAt);
    }
    if (fields.attempts !== undefined) {
      sets.push('attempts = ?');
      params.push(fields.attempts);
    }

    params.push(id, from);
    const result = this.db
      .prepare<Array<string | number | null>>(`UPDATE posts SET ${sets.join(', ')} WHERE id = ? AND status = ?`)
      .run(...params);

    return result.changes === 1 ? this.get(id) : null;
  }

  private rowToPost(row: PostRow): Post {
    return {
      id: row.id,
      clientId: row.client_id,
      ideaId: row.idea_id,
      body: row.body,
      channel: isChannel(row.channel) ? row.channel : 'facebook',
      mediaUrl: row.media_url ?? undefined,
      status: toPostStatus(row.status),
      feedback: row.feedback ?? undefined,
      error: row.error ?? undefined,
      platformPostId: row.platform_post_id ?? undefined,
      attempts: row.attempts,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      publishedAt: row.published_at ?? undefined
    };
  }
}
