// Conversation session storage

import Database from 'better-sqlite3';
import { z } from 'zod';
import { ItemRef, SelectedPostIntent, Session, SessionState } from '../shared/types.js';

export interface SessionConfig {
  expirationMinutes: number; // Idle time before a session is discarded (default: 15)
}

const DEFAULT_CONFIG: SessionConfig = {
  expirationMinutes: 15
};

interface SessionRow {
  client_id: string;
  state: string;
  last_shown_list: string;
  last_intent: string | null;
  created_at: string;
  last_activity_at: string;
  expires_at: string;
}

const itemRefSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('post'), id: z.string() }),
  z.object({
    kind: z.literal('category'),
    id: z.enum(['social_media', 'digital_presence', 'lead_generation', 'email_campaigns'])
  })
]);

const shownListSchema = z.array(itemRefSchema).catch([]);

const intentSchema = z
  .object({ type: z.literal('select_post'), postId: z.string() })
  .nullable()
  .catch(null);

const SESSION_STATES: readonly SessionState[] = ['idle', 'awaiting_selection', 'awaiting_confirmation'];

const parseJson = (raw: string | null): unknown => {
  if (raw === null) return null;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
};

export interface SessionLookup {
  session: Session;
  expired: boolean;
}

export class SessionStorage {
  private config: SessionConfig;

  constructor(
    private db: Database.Database,
    config: Partial<SessionConfig> = {},
    private now: () => Date = () => new Date()
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // Get the live session for a client, replacing an expired one with a fresh session
  getOrCreate(clientId: string): SessionLookup {
    const existing = this.find(clientId);

    if (existing && !this.isExpired(existing)) {
      return { session: existing, expired: false };
    }

    return { session: this.create(clientId), expired: existing !== null };
  }

  find(clientId: string): Session | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE client_id = ?')
      .get(clientId);
    return row ? this.rowToSession(row) : null;
  }

  create(clientId: string): Session {
    const now = this.now();
    const session: Session = {
      clientId,
      state: 'idle',
      lastShownList: [],
      lastIntent: null,
      createdAt: now.toISOString(),
      lastActivityAt: now.toISOString(),
      expiresAt: this.expiryFrom(now)
    };

    this.db.prepare(`
      INSERT INTO sessions
      (client_id, state, last_shown_list, last_intent, created_at, last_activity_at, expires_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(client_id) DO UPDATE SET
        state = excluded.state,
        last_shown_list = excluded.last_shown_list,
        last_intent = excluded.last_intent,
        created_at = excluded.created_at,
        last_activity_at = excluded.last_activity_at,
        expires_at = excluded.expires_at
    `).run(
      session.clientId,
      session.state,
      JSON.stringify(session.lastShownList),
      null,
      session.createdAt,
      session.lastActivityAt,
      session.expiresAt
    );

    return session;
  }

  // Persist new state and extend the expiry window
  save(session: Session): Session {
    const now = this.now();
    const updated: Session = {
      ...session,
      lastActivityAt: now.toISOString(),
      expiresAt: this.expiryFrom(now)
    };

    this.db.prepare(`
      UPDATE sessions
      SET state = ?, last_shown_list = ?, last_intent = ?, last_activity_at = ?, expires_at = ?
      WHERE client_id = ?
    `).run(
      updated.state,
      JSON.stringify(updated.lastShownList),
      updated.lastIntent ? JSON.stringify(updated.lastIntent) : null,
      updated.lastActivityAt,
      updated.expiresAt,
      updated.clientId
    );

    return updated;
  }

  isExpired(session: Session): boolean {
    return new Date(session.expiresAt).getTime() <= this.now().getTime();
  }

  cleanupExpired(): number {
    const result = this.db
      .prepare('DELETE FROM sessions WHERE expires_at <= ?')
      .run(this.now().toISOString());
    return result.changes;
  }

  delete(clientId: string): void {
    this.db.prepare('DELETE FROM sessions WHERE client_id = ?').run(clientId);
  }

  private expiryFrom(now: Date): string {
    return new Date(now.getTime() + this.config.expirationMinutes * 60 * 1000).toISOString();
  }

  private rowToSession(row: SessionRow): Session {
    const lastShownList: ItemRef[] = shownListSchema.parse(parseJson(row.last_shown_list));
    const lastIntent: SelectedPostIntent | null = intentSchema.parse(parseJson(row.last_intent));

    return {
      clientId: row.client_id,
      state: SESSION_STATES.find(state => state === row.state) ?? 'idle',
      lastShownList,
      lastIntent,
      createdAt: row.created_at,
      lastActivityAt: row.last_activity_at,
      expiresAt: row.expires_at
    };
  }
}
