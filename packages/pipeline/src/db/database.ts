import type { DatabaseState } from './records';

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';

import { emptyDatabaseState } from './records';

/**
 * JSON-file database.
 *
 * The whole state is held in memory. Every write goes through
 * {@link JsonDatabase.transaction}, which works on a copy and swaps it in
 * only when the callback returns; the file is then rewritten atomically.
 * Transactions are synchronous, so concurrent jobs never interleave inside
 * one.
 */
export class JsonDatabase {
  private state: DatabaseState;

  /**
   * @param path JSON file to load from and persist to; `null` keeps the
   * database in memory only
   */
  constructor(private readonly path: string | null) {
    this.state = path ? JsonDatabase.load(path) : emptyDatabaseState();
  }

  static inMemory(): JsonDatabase {
    return new JsonDatabase(null);
  }

  private static load(path: string): DatabaseState {
    if (!existsSync(path)) {
      return emptyDatabaseState();
    }
    const stored: Partial<DatabaseState> = JSON.parse(
      readFileSync(path, 'utf-8'),
    );
    // Files written before a table existed lack its key
    return { ...emptyDatabaseState(), ...stored };
  }

  /**
   * Run a read-only query against the current state.
   */
  read<T>(query: (state: Readonly<DatabaseState>) => T): T {
    return query(this.state);
  }

  /**
   * Apply `mutate` to a copy of the state. If it throws, nothing changes.
   */
  transaction<T>(mutate: (state: DatabaseState) => T): T {
    const draft = structuredClone(this.state);
    const result = mutate(draft);
    this.state = draft;
    this.persist();
    return result;
  }

  private persist(): void {
    if (!this.path) {
      return;
    }
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(this.state, null, 2));
    renameSync(tmpPath, this.path);
  }
}
