// INPUT: sql.js, node:fs, schema.sql, types (Note, Label)
// OUTPUT: NotesRepository, SqliteNotesRepository
// POS: Persistence — notes, labels and note↔label links in an embedded SQLite database

import { readFileSync } from "node:fs";
import initSqlJs, { type BindParams, type Database, type ParamsObject, type SqlJsStatic } from "sql.js";
import type { Label, Note } from "./types";

const SCHEMA = readFileSync(new URL("./schema.sql", import.meta.url), "utf8");

export interface NotesRepository {
  /** All notes, or only those in (or out of) the bin. */
  getNotes(filter?: { deleted?: boolean }): Note[];
  getNote(id: number): Note | null;
  /** Inserts a note with id 0, updates it otherwise; returns the id. */
  putNote(note: Note): number;
  deleteNotes(ids: number[]): void;
  getLabels(): Label[];
  putLabel(label: Label): void;
  deleteLabel(name: string): void;
  setNoteLabels(noteId: number, names: string[]): void;
}

// ── Rows ────────────────────────────────────────────────────────────

function numberColumn(row: ParamsObject, column: string): number {
  const value = row[column];
  if (typeof value !== "number") throw new Error(`Column ${column} is not a number`);
  return value;
}

function stringColumn(row: ParamsObject, column: string): string {
  const value = row[column];
  if (typeof value !== "string") throw new Error(`Column ${column} is not text`);
  return value;
}

function toLabel(row: ParamsObject): Label {
  return { name: stringColumn(row, "name"), visible: numberColumn(row, "visible") === 1 };
}

const NOTE_COLUMNS = "id, deleted, pinned, created_time, edited_time, title, content";

// sql.js loads its WebAssembly build once per process
let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

export class SqliteNotesRepository implements NotesRepository {
  private savepoints = 0;

  private constructor(private readonly db: Database) {
    this.db.run("PRAGMA foreign_keys = ON");
    this.db.exec(SCHEMA);
  }

  /** Opens a database from the bytes of a saved one, or an empty database. */
  static async open(data?: Uint8Array): Promise<SqliteNotesRepository> {
    const SQL = await loadSqlJs();
    return new SqliteNotesRepository(new SQL.Database(data));
  }

  /** Bytes of the whole database, to be written to disk and reopened later. */
  export(): Uint8Array {
    return this.db.export();
  }

  close(): void {
    this.db.close();
  }

  private all(sql: string, params: BindParams = []): ParamsObject[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: ParamsObject[] = [];
      while (statement.step()) rows.push(statement.getAsObject());
      return rows;
    } finally {
      statement.free();
    }
  }

  private run(sql: string, params: BindParams = []): void {
    this.db.run(sql, params);
  }

  /** Runs `work` atomically; nested calls become savepoints of the outer one. */
  private transaction<T>(work: () => T): T {
    const name = `sp_${this.savepoints++}`;
    this.db.run(`SAVEPOINT ${name}`);
    try {
      const result = work();
      this.db.run(`RELEASE ${name}`);
      return result;
    } catch (err) {
      this.db.run(`ROLLBACK TO ${name}`);
      this.db.run(`RELEASE ${name}`);
      throw err;
    } finally {
      this.savepoints--;
    }
  }

  private labelsByNote(noteId?: number): Map<number, Label[]> {
    const sql =
      "SELECT nl.note_id, l.name, l.visible FROM note_labels nl JOIN labels l ON l.name = nl.label_name";
    const rows =
      noteId === undefined
        ? this.all(`${sql} ORDER BY l.name`)
        : this.all(`${sql} WHERE nl.note_id = ? ORDER BY l.name`, [noteId]);

    const labels = new Map<number, Label[]>();
    for (const row of rows) {
      const id = numberColumn(row, "note_id");
      const list = labels.get(id) ?? [];
      list.push(toLabel(row));
      labels.set(id, list);
    }
    return labels;
  }

  private toNote(row: ParamsObject, labels: Map<number, Label[]>): Note {
    const id = numberColumn(row, "id");
    return {
      id,
      deleted: numberColumn(row, "deleted") === 1,
      pinned: numberColumn(row, "pinned") === 1,
      createdTime: new Date(numberColumn(row, "created_time")),
      editedTime: new Date(numberColumn(row, "edited_time")),
      title: stringColumn(row, "title"),
      content: stringColumn(row, "content"),
      labels: labels.get(id) ?? [],
    };
  }

  getNotes(filter: { deleted?: boolean } = {}): Note[] {
    const rows =
      filter.deleted === undefined
        ? this.all(`SELECT ${NOTE_COLUMNS} FROM notes ORDER BY id`)
        : this.all(`SELECT ${NOTE_COLUMNS} FROM notes WHERE deleted = ? ORDER BY id`, [filter.deleted ? 1 : 0]);
    const labels = this.labelsByNote();
    return rows.map((row) => this.toNote(row, labels));
  }

  getNote(id: number): Note | null {
    const [row] = this.all(`SELECT ${NOTE_COLUMNS} FROM notes WHERE id = ?`, [id]);
    return row ? this.toNote(row, this.labelsByNote(id)) : null;
  }

  putNote(note: Note): number {
    const values = [
      note.deleted ? 1 : 0,
      note.pinned ? 1 : 0,
      note.createdTime.getTime(),
      note.editedTime.getTime(),
      note.title,
      note.content,
    ];

    return this.transaction((): number => {
      let id = note.id;
      if (id === 0) {
        this.run(
          "INSERT INTO notes (deleted, pinned, created_time, edited_time, title, content) VALUES (?, ?, ?, ?, ?, ?)",
          values,
        );
        const [row] = this.all("SELECT last_insert_rowid() AS id");
        id = row ? numberColumn(row, "id") : 0;
      } else {
        this.run(
          "UPDATE notes SET deleted = ?, pinned = ?, created_time = ?, edited_time = ?, title = ?, content = ? WHERE id = ?",
          [...values, id],
        );
      }
      for (const label of note.labels) {
        this.run("INSERT OR IGNORE INTO labels (name, visible) VALUES (?, ?)", [label.name, label.visible ? 1 : 0]);
      }
      this.setNoteLabels(
        id,
        note.labels.map((label) => label.name),
      );
      return id;
    });
  }

  deleteNotes(ids: number[]): void {
    this.transaction(() => {
      for (const id of ids) this.run("DELETE FROM notes WHERE id = ?", [id]);
    });
  }

  getLabels(): Label[] {
    return this.all("SELECT name, visible FROM labels ORDER BY name").map(toLabel);
  }

  putLabel(label: Label): void {
    this.run(
      "INSERT INTO labels (name, visible) VALUES (?, ?) ON CONFLICT (name) DO UPDATE SET visible = excluded.visible",
      [label.name, label.visible ? 1 : 0],
    );
  }

  deleteLabel(name: string): void {
    this.run("DELETE FROM labels WHERE name = ?", [name]);
  }

  /** Replaces the labels of a note; every name must already be a label. */
  setNoteLabels(noteId: number, names: string[]): void {
    this.transaction(() => {
      this.run("DELETE FROM note_labels WHERE note_id = ?", [noteId]);
      for (const name of new Set(names)) {
        this.run("INSERT INTO note_labels (note_id, label_name) VALUES (?, ?)", [noteId, name]);
      }
    });
  }
}
