// Unit tests for SessionManager

import { describe, it, expect, beforeEach } from 'vitest';
import { ClientStorage } from '../../../src/db/clients.js';
import { createMemoryDatabase } from '../../../src/db/index.js';
import { SessionManager } from '../../../src/orchestrator/session.js';
import { clientInput } from '../../helpers.js';

describe('SessionManager', () => {
  let sessions: SessionManager;
  let now: Date;
  let clientId: string;

  beforeEach(() => {
    const db = createMemoryDatabase();
    clientId = new ClientStorage(db).upsert(clientInput()).id;
    now = new Date('2026-05-04T09:00:00.000Z');
    sessions = new SessionManager(db, { expirationMinutes: 15 }, () => now);
  });

  it('waits for a selection while a list is shown', () => {
    const { session } = sessions.getOrCreate(clientId);

    const shown = sessions.showList(session, [{ kind: 'post', id: 'p1' }]);

    expect(shown.state).toBe('awaiting_selection');
    expect(sessions.getOrCreate(clientId).session.lastShownList).toEqual([{ kind: 'post', id: 'p1' }]);
  });

  it('goes idle when an empty list is shown', () => {
    const { session } = sessions.getOrCreate(clientId);

    expect(sessions.showList(session, []).state).toBe('idle');
  });

  it('keeps the list after a post is selected', () => {
    const { session } = sessions.getOrCreate(clientId);
    const shown = sessions.showList(session, [{ kind: 'post', id: 'p1' }, { kind: 'post', id: 'p2' }]);

    sessions.selectPost(shown, 'p2');

    const stored = sessions.getOrCreate(clientId).session;
    expect(stored.state).toBe('awaiting_confirmation');
    expect(stored.lastIntent).toEqual({ type: 'select_post', postId: 'p2' });
    expect(stored.lastShownList).toHaveLength(2);
  });

  it('clears everything on reset', () => {
    const { session } = sessions.getOrCreate(clientId);
    const picked = sessions.selectPost(sessions.showList(session, [{ kind: 'post', id: 'p1' }]), 'p1');

    const reset = sessions.reset(picked);

    expect(reset).toMatchObject({ state: 'idle', lastShownList: [], lastIntent: null });
  });

  it('extends the expiry on activity', () => {
    const { session } = sessions.getOrCreate(clientId);

    now = new Date('2026-05-04T09:10:00.000Z');
    const touched = sessions.touch(session);

    expect(touched.expiresAt).toBe('2026-05-04T09:25:00.000Z');
    now = new Date('2026-05-04T09:20:00.000Z');
    expect(sessions.getOrCreate(clientId).expired).toBe(false);
  });

  it('drops expired sessions', () => {
    sessions.getOrCreate(clientId);

    now = new Date('2026-05-04T09:30:00.000Z');

    expect(sessions.cleanupExpired()).toBe(1);
    expect(sessions.getOrCreate(clientId).expired).toBe(false);
  });
});
