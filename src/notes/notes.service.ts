import { Injectable } from '@nestjs/common';
import { StoreHandle } from '../switchboard/store-handle';

export interface Note {
  id: number;
  body: string;
  createdAt: string;
}

// pg row types must be type aliases to satisfy QueryResultRow.
type NoteRow = {
  id: number;
  body: string;
  created_at: Date;
};

function toNote(row: NoteRow): Note {
  return { id: row.id, body: row.body, createdAt: new Date(row.created_at).toISOString() };
}

/**
 * Tenant-scoped sample resource. Every method takes the request's store
 * handle; there is no other way to reach tenant data.
 */
@Injectable()
export class NotesService {
  async list(store: StoreHandle, limit = 50): Promise<Note[]> {
    const { rows } = await store.query<NoteRow>(
      'SELECT id, body, created_at FROM notes ORDER BY id DESC LIMIT $1',
      [limit],
    );
    return rows.map(toNote);
  }

  async create(store: StoreHandle, body: string): Promise<Note> {
    const { rows } = await store.query<NoteRow>(
      'INSERT INTO notes (body) VALUES ($1) RETURNING id, body, created_at',
      [body],
    );
    return toNote(rows[0]);
  }
}
