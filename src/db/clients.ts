// Client storage

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ApprovalMode, Channel, CHANNELS, Client, ClientPageIds, ClientStatus } from '../shared/types.js';

interface ClientRow {
  id: string;
  name: string;
  handle: string;
  status: string;
  channels: string;
  cadence_per_week: number;
  brand_voice: string;
  instructions: string;
  approval_mode: string;
  page_ids: string;
  created_at: string;
  updated_at: string;
}

export interface ClientInput {
  id?: string;
  name: string;
  handle: string;
  status?: ClientStatus;
  channels?: Channel[];
  cadencePerWeek?: number;
  brandVoice?: string;
  instructions?: string;
  approvalMode?: ApprovalMode;
  pageIds?: ClientPageIds;
}

const channelsSchema = z.array(z.enum(['facebook', 'instagram', 'linkedin'])).catch([]);
const pageIdsSchema = z
  .object({
    facebook: z.string().optional(),
    instagram: z.string().optional(),
    linkedin: z.string().optional()
  })
  .catch({});

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

export class ClientStorage {
  constructor(private db: Database.Database) {}

  get(id: string): Client | null {
    const row = this.db.prepare<[string], ClientRow>('SELECT * FROM clients WHERE id = ?').get(id);
    return row ? this.rowToClient(row) : null;
  }

  findByHandle(handle: string): Client | null {
    const row = this.db
      .prepare<[string], ClientRow>('SELECT * FROM clients WHERE handle = ?')
      .get(handle.trim());
    return row ? this.rowToClient(row) : null;
  }

  list(status?: ClientStatus): Client[] {
    const rows = status
      ? this.db.prepare<[string], ClientRow>('SELECT * FROM clients WHERE status = ? ORDER BY rowid').all(status)
      : this.db.prepare<[], ClientRow>('SELECT * FROM clients ORDER BY rowid').all();
    return rows.map(row => this.rowToClient(row));
  }

  // Insert or update by id; an existing handle keeps its id
  upsert(input: ClientInput): Client {
    const now = new Date().toISOString();
    const existing = input.id ? this.get(input.id) : this.findByHandle(input.handle);

    const client: Client = {
      id: existing?.id ?? input.id ?? randomUUID(),
      name: input.name,
      handle: input.handle.trim(),
      status: input.status ?? existing?.status ?? 'active',
      channels: input.channels ?? existing?.channels ?? [...CHANNELS],
      cadencePerWeek: input.cadencePerWeek ?? existing?.cadencePerWeek ?? 3,
      brandVoice: input.brandVoice ?? existing?.brandVoice ?? '',
      instructions: input.instructions ?? existing?.instructions ?? '',
      approvalMode: input.approvalMode ?? existing?.approvalMode ?? 'manual',
      pageIds: input.pageIds ?? existing?.pageIds ?? {},
      createdAt: existing?.createdAt ?? now,
      updatedAt: now
    };

    this.db.prepare(`
      INSERT INTO clients
      (id, name, handle, status, channels, cadence_per_week, brand_voice, instructions, approval_mode, page_ids, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        handle = excluded.handle,
        status = excluded.status,
        channels = excluded.channels,
        cadence_per_week = excluded.cadence_per_week,
        brand_voice = excluded.brand_voice,
        instructions = excluded.instructions,
        approval_mode = excluded.approval_mode,
        page_ids = excluded.page_ids,
        updated_at = excluded.updated_at
    `).run(
      client.id,
      client.name,
      client.handle,
      client.status,
      JSON.stringify(client.channels),
      client.cadencePerWeek,
      client.brandVoice,
      client.instructions,
      client.approvalMode,
      JSON.stringify(client.pageIds),
      client.createdAt,
      client.updatedAt
    );

    return client;
  }

  setStatus(id: string, status: ClientStatus): boolean {
    const result = this.db
      .prepare('UPDATE clients SET status = ?, updated_at = ? WHERE id = ?')
      .run(status, new Date().toISOString(), id);
    return result.changes > 0;
  }

  private rowToClient(row: ClientRow): Client {
    return {
      id: row.id,
      name: row.name,
      handle: row.handle,
      status: row.status === 'active' ? 'active' : 'inactive',
      channels: channelsSchema.parse(parseJson(row.channels)),
      cadencePerWeek: row.cadence_per_week,
      brandVoice: row.brand_voice,
      instructions: row.instructions,
      approvalMode: row.approval_mode === 'auto' ? 'auto' : 'manual',
      pageIds: pageIdsSchema.parse(parseJson(row.page_ids)),
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }
}
