// INPUT: zod, crypto.ts (encryptNote, decryptNote), document.ts (parseDocument), logger.ts, types (Note, Label)
// OUTPUT: BackupError, BACKUP_VERSION, NoteJson, noteToJson, buildBackup, parseBackup
// POS: JSON backup of every note and label, optionally encrypted with a password

import { z } from "zod";
import { decryptNote, encryptNote } from "./crypto";
import { parseDocument } from "./document";
import { log } from "./logger";
import type { Label, Note } from "./types";

export const BACKUP_VERSION = 1;

export class BackupError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "BackupError";
  }
}

// ── Schema ──────────────────────────────────────────────────────────
// The store id is not exported: notes get fresh ids when imported.

const NoteJsonSchema = z.object({
  deleted: z.boolean(),
  pinned: z.boolean(),
  createdTime: z.string().datetime({ offset: true }),
  editedTime: z.string().datetime({ offset: true }),
  title: z.string(),
  content: z.string(),
  labels: z.array(z.string()).default([]),
});

const LabelJsonSchema = z.object({
  name: z.string().min(1),
  visible: z.boolean().default(true),
});

const BackupSchema = z.object({
  version: z.literal(BACKUP_VERSION),
  encrypted: z.boolean(),
  labels: z.array(LabelJsonSchema).default([]),
  notes: z.array(NoteJsonSchema),
});

export type NoteJson = z.infer<typeof NoteJsonSchema>;

export function noteToJson(note: Note): NoteJson {
  return {
    deleted: note.deleted,
    pinned: note.pinned,
    createdTime: note.createdTime.toISOString(),
    editedTime: note.editedTime.toISOString(),
    title: note.title,
    content: note.content,
    labels: note.labels.map((label) => label.name),
  };
}

/**
 * Serialize notes and labels. With a password, the title (when not
 * empty) and the content of every note are encrypted; dates, flags and
 * label names stay readable.
 */
export async function buildBackup(notes: Note[], labels: Label[], password?: string): Promise<string> {
  const exported = password
    ? await Promise.all(notes.map((note) => encryptNote(note, password)))
    : notes;

  return JSON.stringify({
    version: BACKUP_VERSION,
    encrypted: Boolean(password),
    labels: labels.map((label) => ({ name: label.name, visible: label.visible })),
    notes: exported.map(noteToJson),
  });
}

/**
 * Parse a backup into notes (with id 0) and labels. Labels referenced by
 * notes but missing from the label list are created visible.
 */
export async function parseBackup(
  json: string,
  password?: string,
): Promise<{ notes: Note[]; labels: Label[] }> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new BackupError("Backup is not valid JSON", err);
  }

  const result = BackupSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new BackupError(`Backup is invalid at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? ""}`, result.error);
  }
  const backup = result.data;

  if (backup.encrypted && !password) {
    throw new BackupError("Backup is encrypted, a password is required");
  }

  const labels = new Map<string, Label>();
  for (const label of backup.labels) {
    labels.set(label.name, { name: label.name, visible: label.visible });
  }

  const notes: Note[] = [];
  for (const raw of backup.notes) {
    for (const name of raw.labels) {
      if (!labels.has(name)) labels.set(name, { name, visible: true });
    }

    let note: Note = {
      id: 0,
      deleted: raw.deleted,
      pinned: raw.pinned,
      createdTime: new Date(raw.createdTime),
      editedTime: new Date(raw.editedTime),
      title: raw.title,
      content: raw.content,
      labels: raw.labels.flatMap((name) => {
        const label = labels.get(name);
        return label ? [label] : [];
      }),
    };
    if (backup.encrypted && password) {
      note = await decryptNote(note, password);
    }

    // Content must open in the editor
    parseDocument(note.content);
    notes.push(note);
  }

  log.info(`[backup] parsed ${notes.length} notes and ${labels.size} labels`);
  return { notes, labels: [...labels.values()] };
}
