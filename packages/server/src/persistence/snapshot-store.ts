import type { SupabaseClient } from '@supabase/supabase-js';
import { parseSnapshot } from './schema.js';
import type { LobbySnapshot } from './schema.js';

export interface SnapshotStore {
  load(): Promise<LobbySnapshot | null>;
  save(snapshot: LobbySnapshot): Promise<void>;
}

/**
 * Keeps the latest snapshot in process. Used when Supabase is not configured,
 * and by tests.
 */
export class MemorySnapshotStore implements SnapshotStore {
  private latest: string | null = null;

  constructor(initial?: LobbySnapshot) {
    if (initial) this.latest = JSON.stringify(initial);
  }

  async load(): Promise<LobbySnapshot | null> {
    return this.latest === null ? null : parseSnapshot(JSON.parse(this.latest));
  }

  async save(snapshot: LobbySnapshot): Promise<void> {
    // Stored as JSON so a later load never aliases live state
    this.latest = JSON.stringify(snapshot);
  }
}

const TABLE = 'hanabi_snapshots';

/**
 * One row per lobby in the hanabi_snapshots table:
 *   id text primary key, snapshot jsonb, updated_at timestamptz
 */
export class SupabaseSnapshotStore implements SnapshotStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly lobbyId = 'default'
  ) {}

  async load(): Promise<LobbySnapshot | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('snapshot')
      .eq('id', this.lobbyId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to load snapshot: ${error.message}`);
    }

    if (!data) {
      return null;
    }

    return parseSnapshot(data.snapshot);
  }

  async save(snapshot: LobbySnapshot): Promise<void> {
    const { error } = await this.client.from(TABLE).upsert({
      id: this.lobbyId,
      snapshot,
      updated_at: snapshot.savedAt,
    });

    if (error) {
      throw new Error(`Failed to save snapshot: ${error.message}`);
    }
  }
}
