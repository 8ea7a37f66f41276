/**
 * SQLite-backed feed storage.
 *
 * One row per frame, keyed by (author, sequence), holding the exact encoded
 * frame bytes. Uses better-sqlite3 for synchronous SQLite,
 * so a read-validate-append runs inside a single transaction.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import { decodeFrame, encodeFrame } from "../protocol/codec.js";
import { StoreClosedError } from "../protocol/errors.js";
import type { Frame } from "../protocol/types.js";
import { assertExtendsHead, type FeedStore } from "./store.js";

const SCHEMA_VERSION = 1;

interface FrameRow {
  frame: Buffer;
}

export class SqliteFeedStore implements FeedStore {
  private _dbPath: string;
  private _db: Database.Database | null = null;

  /**
   * @param dbPath Database file, or ":memory:".
   */
  constructor(dbPath: string) {
    this._dbPath = dbPath;
  }

  /**
   * Open the database, create tables and run migrations.
   */
  open(): void {
    if (this._dbPath !== ":memory:") {
      mkdirSync(dirname(this._dbPath), { recursive: true });
    }
    this._db = new Database(this._dbPath);
    this._db.pragma("journal_mode = WAL");

    this._db.exec(`
      CREATE TABLE IF NOT EXISTS frames (
        author     BLOB    NOT NULL,
        sequence   INTEGER NOT NULL,
        frame      BLOB    NOT NULL,
        PRIMARY KEY (author, sequence)
      ) WITHOUT ROWID;
    `);

    this._migrate();
  }

  /**
   * Run schema migrations using PRAGMA user_version.
   */
  private _migrate(): void {
    const db = this._requireDb();
    const versionRow = db.prepare("PRAGMA user_version").get() as { user_version: number };
    if (versionRow.user_version < SCHEMA_VERSION) {
      db.exec(`PRAGMA user_version = ${SCHEMA_VERSION}`);
    }
  }

  /**
   * Close the database connection.
   */
  close(): void {
    if (this._db !== null) {
      this._db.close();
      this._db = null;
    }
  }

  append(frame: Frame): void {
    const db = this._requireDb();
    const author = Buffer.from(frame.message.author);
    const encoded = encodeFrame(frame);
    db.transaction(() => {
      assertExtendsHead(frame, this._headSequence(author));
      db.prepare(
        "INSERT INTO frames (author, sequence, frame) VALUES (?, ?, ?)"
      ).run(author, frame.message.sequence, Buffer.from(encoded));
    })();
  }

  latest(author: Uint8Array): Frame | null {
    const row = this._requireDb()
      .prepare("SELECT frame FROM frames WHERE author = ? ORDER BY sequence DESC LIMIT 1")
      .get(Buffer.from(author)) as FrameRow | undefined;
    return row ? decodeFrame(new Uint8Array(row.frame)) : null;
  }

  get(author: Uint8Array, sequence: number): Frame | null {
    const row = this._requireDb()
      .prepare("SELECT frame FROM frames WHERE author = ? AND sequence = ?")
      .get(Buffer.from(author), sequence) as FrameRow | undefined;
    return row ? decodeFrame(new Uint8Array(row.frame)) : null;
  }

  iterate(author: Uint8Array, fromSequence = 1): Iterable<Frame> {
    this._requireDb();
    const authorKey = Buffer.from(author);
    return {
      [Symbol.iterator]: () => this._rows(authorKey, fromSequence),
    };
  }

  private *_rows(author: Buffer, fromSequence: number): Generator<Frame> {
    const rows = this._requireDb()
      .prepare("SELECT frame FROM frames WHERE author = ? AND sequence >= ? ORDER BY sequence ASC")
      .iterate(author, fromSequence) as IterableIterator<FrameRow>;
    for (const row of rows) {
      yield decodeFrame(new Uint8Array(row.frame));
    }
  }

  authors(): Uint8Array[] {
    const rows = this._requireDb()
      .prepare("SELECT DISTINCT author FROM frames ORDER BY author")
      .all() as Array<{ author: Buffer }>;
    return rows.map((r) => new Uint8Array(r.author));
  }

  atomically<T>(fn: () => T): T {
    return this._requireDb().transaction(fn)();
  }

  private _headSequence(author: Buffer): number {
    const row = this._requireDb()
      .prepare("SELECT MAX(sequence) AS head FROM frames WHERE author = ?")
      .get(author) as { head: number | null };
    return row.head ?? 0;
  }

  private _requireDb(): Database.Database {
    if (this._db === null) {
      throw new StoreClosedError("Feed store is not open. Call open() first.");
    }
    return this._db;
  }
}
