// Idea storage

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { Idea, IdeaOrigin, IdeaState, isChannel } from '../shared/types.js';

interface IdeaRow {
  id: string;
  client_id: string;
  headline: string;
  summary: string;
  image_url: string | null;
  origin: string;
  state: string;
  channel: string | null;
  source_detail: string | null;
  created_at: string;
  updated_at: string;
}

export interface IdeaInput {
  headline: string;
  summary: string;
  origin: IdeaOrigin;
  imageUrl?: string;
  channel?: Idea['channel'];
  sourceDetail?: string;
}

export interface IdeaQuery {
  state?: IdeaState;
  ids?: string[];
  limit?: number;
}

const IDEA_STATES: readonly IdeaState[] = ['new', 'drafted', 'discarded'];

const toIdeaState = (value: string): IdeaState =>
  IDEA_STATES.find(state => state === value) ?? 'discarded';

export class IdeaStorage {
  constructor(private db: Database.Database) {}

  create(clientId: string, input: IdeaInput): Idea {
    const now = new Date().toISOString();
    const idea: Idea = {
      id: randomUUID(),
      clientId,
      headline: input.headline,
      summary: input.summary,
      imageUrl: input.imageUrl,
      origin: input.origin,
      state: 'new',
      channel: input.channel,
      sourceDetail: input.sourceDetail,
      createdAt: now,
      updatedAt: now
    };

    this.db.prepare(`
      INSERT INTO ideas
      (id, client_id, headline, summary, image_url, origin, state, channel, source_detail, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      idea.id,
      idea.clientId,
      idea.headline,
      idea.summary,
      idea.imageUrl ?? null,
      idea.origin,
      idea.state,
      idea.channel ?? null,
      idea.sourceDetail ?? null,
      idea.createdAt,
      idea.updatedAt
    );

    return idea;
  }

  get(id: string): Idea | null {
    const row = this.db.prepare<[string], IdeaRow>('SELECT * FROM ideas WHERE id = ?').get(id);
    return row ? this.rowToIdea(row) : null;
  }

  // Oldest first, by insertion order
  list(clientId: string, query: IdeaQuery = {}): Idea[] {
    const clauses = ['client_id = ?'];
    const params: Array<string | number> = [clientId];

    if (query.state) {
      clauses.push('state = ?');
      params.push(query.state);
    }
    if (query.ids) {
      if (query.ids.length === 0) return [];
      clauses.push(`id IN (${query.ids.map(() => '?').join(', ')})`);
      params.push(...query.ids);
    }

    let sql = `SELECT * FROM ideas WHERE ${clauses.join(' AND ')} ORDER BY rowid`;
    if (query.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    return this.db
      .prepare<Array<string | number>, IdeaRow>(sql)
      .all(...params)
      .map(row => this.rowToIdea(row));
  }

  count(clientId: string, state?: IdeaState): number {
    const row = state
      ? this.db
          .prepare<[string, string], { total: number }>('SELECT COUNT(*) AS total FROM ideas WHERE client_id = ? AND state = ?')
          .get(clientId, state)
      : this.db
          .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM ideas WHERE client_id = ?')
          .get(clientId);
    return row?.total ?? 0;
  }

  // Compare-and-set; false when the idea was not in the expected state
  transition(id: string, from: IdeaState, to: IdeaState): boolean {
    const result = this.db
      .prepare('UPDATE ideas SET state = ?, updated_at = ? WHERE id = ? AND state = ?')
      .run(to, new Date().toISOString(), id, from);
    return result.changes === 1;
  }

  private rowToIdea(row: IdeaRow): Idea {
    return {
      id: row.id,
      clientId: row.client_id,
      headline: row.headline,
      summary: row.summary,
      imageUrl: row.image_url ?? undefined,
      origin: row.origin === 'client-submitted' ? 'client-submitted' : 'curated',
      state: toIdeaState(row.state),
      channel: row.channel && isChannel(row.channel) ? row.channel : undefined,
      sourceDetail: row.source_detail ?? undefined,
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }
}
