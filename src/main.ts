// INPUT: repository.ts, settings.ts, sort.ts, note.ts, menu.ts, backup.ts, export.ts, logger.ts
// OUTPUT: NotesApp (application facade), NotesAppPorts, and the public API of every module
// POS: Entry point — note actions wired to storage, preferences and confirmations

import { BackupError, buildBackup, parseBackup } from "./backup";
import { exportNotes, type ExportSummary } from "./export";
import { log } from "./logger";
import { requiresConfirmation, type NoteAction } from "./menu";
import { emptyNote, notePlainText, shareText } from "./note";
import type { NotesRepository } from "./repository";
import type { Preferences, SwipeAction } from "./settings";
import { sortNotes } from "./sort";
import type { Note } from "./types";

export * from "./backup";
export * from "./content";
export * from "./crypto";
export * from "./document";
export * from "./export";
export * from "./labels";
export * from "./markdown";
export * from "./menu";
export * from "./note";
export * from "./repository";
export * from "./settings";
export * from "./sort";
export * from "./tile";
export * from "./types";
export { log, type LogLevel } from "./logger";

export interface NotesAppPorts {
  /** Asked before actions the confirmations preference guards; resolves to the user's answer. */
  confirm?: (action: NoteAction, note: Note | null) => Promise<boolean>;
  clipboard?: (text: string) => Promise<void>;
  share?: (text: string) => Promise<void>;
  now?: () => Date;
}

export class NotesApp {
  preferences: Preferences;
  private readonly repository: NotesRepository;
  private readonly ports: NotesAppPorts;

  constructor(repository: NotesRepository, preferences: Preferences, ports: NotesAppPorts = {}) {
    this.repository = repository;
    this.preferences = preferences;
    this.ports = ports;
  }

  private now(): Date {
    return this.ports.now ? this.ports.now() : new Date();
  }

  private sorted(notes: Note[]): Note[] {
    return sortNotes(notes, this.preferences.sortMethod, this.preferences.sortAscending);
  }

  private async confirmed(action: NoteAction, note: Note | null): Promise<boolean> {
    if (!requiresConfirmation(action, this.preferences.confirmations)) return true;
    if (!this.ports.confirm) return true;
    return this.ports.confirm(action, note);
  }

  private require(id: number): Note {
    const note = this.repository.getNote(id);
    if (!note) throw new Error(`Note ${id} does not exist`);
    return note;
  }

  // ── Lists ─────────────────────────────────────────────────────────

  listNotes(): Note[] {
    return this.sorted(this.repository.getNotes({ deleted: false }));
  }

  listBin(): Note[] {
    return this.sorted(this.repository.getNotes({ deleted: true }));
  }

  /** Notes (out of the bin) whose title or text contains `query`, ignoring case. */
  search(query: string): Note[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    return this.listNotes().filter((note) => {
      if (note.title.toLowerCase().includes(needle)) return true;
      try {
        return notePlainText(note).toLowerCase().includes(needle);
      } catch (err) {
        // Unreadable content: title match only
        log.warn(`[search] skipping content of note ${note.id}:`, err);
        return false;
      }
    });
  }

  // ── Editing ───────────────────────────────────────────────────────

  createNote(): Note {
    const note = emptyNote(this.now());
    const id = this.repository.putNote(note);
    log.debug(`[notes] created note ${id}`);
    return { ...note, id };
  }

  /** Stores the edited title and content, bumping the edited time. */
  saveNote(note: Note): Note {
    const saved = { ...note, editedTime: this.now() };
    const id = this.repository.putNote(saved);
    return { ...saved, id };
  }

  selectLabels(id: number, names: string[]): Note {
    const known = new Set(this.repository.getLabels().map((label) => label.name));
    const unknown = names.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new Error(`Unknown labels: ${unknown.join(", ")}`);
    }
    this.repository.setNoteLabels(id, names);
    return this.saveNote(this.require(id));
  }

  // ── Actions ───────────────────────────────────────────────────────
  // Each resolves to whether the action ran (false when not confirmed).

  async togglePin(id: number): Promise<boolean> {
    const note = this.require(id);
    if (!(await this.confirmed("togglePin", note))) return false;
    this.saveNote({ ...note, pinned: !note.pinned });
    return true;
  }

  async deleteNote(id: number): Promise<boolean> {
    const note = this.require(id);
    if (!(await this.confirmed("delete", note))) return false;
    this.saveNote({ ...note, deleted: true });
    return true;
  }

  async restoreNote(id: number): Promise<boolean> {
    const note = this.require(id);
    if (!(await this.confirmed("restore", note))) return false;
    this.saveNote({ ...note, deleted: false });
    return true;
  }

  async permanentlyDeleteNote(id: number): Promise<boolean> {
    const note = this.require(id);
    if (!(await this.confirmed("deletePermanently", note))) return false;
    this.repository.deleteNotes([id]);
    log.debug(`[notes] permanently deleted note ${id}`);
    return true;
  }

  async emptyBin(): Promise<boolean> {
    const bin = this.repository.getNotes({ deleted: true });
    if (bin.length === 0) return false;
    if (!(await this.confirmed("emptyBin", null))) return false;
    this.repository.deleteNotes(bin.map((note) => note.id));
    log.debug(`[notes] emptied bin (${bin.length} notes)`);
    return true;
  }

  async copyNote(id: number): Promise<void> {
    if (!this.ports.clipboard) throw new Error("No clipboard available");
    await this.ports.clipboard(shareText(this.require(id)));
  }

  async shareNote(id: number): Promise<void> {
    if (!this.ports.share) throw new Error("No share target available");
    await this.ports.share(shareText(this.require(id)));
  }

  /**
   * Runs the action bound to a swipe. Resolves to whether the tile should
   * be dismissed: only a note that left the list is.
   */
  async performSwipeAction(note: Note, action: SwipeAction): Promise<boolean> {
    switch (action) {
      case "delete":
        return this.deleteNote(note.id);
      case "togglePin":
        await this.togglePin(note.id);
        return false;
      case "share":
        await this.shareNote(note.id);
        return false;
      case "copy":
        await this.copyNote(note.id);
        return false;
      case "disabled":
        throw new Error("Unexpected swipe action when swiping on note tile: disabled");
    }
  }

  // ── Backup & export ───────────────────────────────────────────────

  async exportBackup(password?: string): Promise<string> {
    if (this.preferences.encryptBackups && !password) {
      throw new BackupError("Backups are encrypted, a password is required");
    }
    return buildBackup(this.repository.getNotes(), this.repository.getLabels(), password);
  }

  /** Adds every note of the backup as a new note; returns how many were imported. */
  async importBackup(json: string, password?: string): Promise<number> {
    const { notes, labels } = await parseBackup(json, password);
    for (const label of labels) this.repository.putLabel(label);
    for (const note of notes) this.repository.putNote(note);
    log.info(`[backup] imported ${notes.length} notes`);
    return notes.length;
  }

  exportMarkdown(targetFolder: string, signal?: AbortSignal): Promise<ExportSummary> {
    return exportNotes(this.listNotes(), targetFolder, signal);
  }
}
