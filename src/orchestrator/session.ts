// Orchestrator session management layer

import Database from 'better-sqlite3';
import { SessionConfig, SessionLookup, SessionStorage } from '../db/sessions.js';
import { ItemRef, Session } from '../shared/types.js';

export class SessionManager {
  private storage: SessionStorage;

  constructor(db: Database.Database, config?: Partial<SessionConfig>, now?: () => Date) {
    this.storage = new SessionStorage(db, config, now);
  }

  // Live session for the client; `expired` tells the interpreter an old one was dropped
  getOrCreate(clientId: string): SessionLookup {
    return this.storage.getOrCreate(clientId);
  }

  // A list is on screen and waiting for a pick
  showList(session: Session, items: ItemRef[]): Session {
    return this.storage.save({
      ...session,
      state: items.length > 0 ? 'awaiting_selection' : 'idle',
      lastShownList: items,
      lastIntent: null
    });
  }

  // A post was picked; approve/reject expected next. The list stays for further picks.
  selectPost(session: Session, postId: string): Session {
    return this.storage.save({
      ...session,
      state: 'awaiting_confirmation',
      lastIntent: { type: 'select_post', postId }
    });
  }

  // Back to neutral after a terminal action
  reset(session: Session): Session {
    return this.storage.save({
      ...session,
      state: 'idle',
      lastShownList: [],
      lastIntent: null
    });
  }

  // Extend the expiry without changing state
  touch(session: Session): Session {
    return this.storage.save(session);
  }

  cleanupExpired(): number {
    return this.storage.cleanupExpired();
  }
}
