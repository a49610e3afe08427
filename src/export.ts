// INPUT: node:fs/promises, node:path, labels.ts, note.ts (noteMarkdown), logger.ts, types (Note)
// OUTPUT: sanitizeFilename, escapeYamlString, buildFrontmatter, buildNoteMarkdown, resolveFilename, frontmatterNoteId, exportNotes, ExportSummary
// POS: Markdown export — writes every note to a .md file with YAML frontmatter

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { visibleLabelNamesSorted } from "./labels";
import { log } from "./logger";
import { noteMarkdown } from "./note";
import type { Note } from "./types";

const UNSAFE_CHARS = /[/\\?%*:|"<>\0]/g;
const UNTITLED = "Untitled";

/**
 * Remove filesystem-unsafe characters, collapse whitespace, strip leading dots,
 * trim, and limit to 200 characters.
 */
export function sanitizeFilename(name: string): string {
  const result = name
    .replace(UNSAFE_CHARS, "")
    .replace(/\s+/g, " ")
    .replace(/^\.+/, "")
    .trim()
    .slice(0, 200);
  return result || UNTITLED;
}

/**
 * Escape special characters for safe embedding inside a YAML double-quoted string.
 */
export function escapeYamlString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\0/g, "")
    .replace(/[\u2028\u2029]/g, "");
}

/**
 * YAML frontmatter with a fixed field order:
 * id, title, pinned, labels, created_at, edited_at
 */
export function buildFrontmatter(note: Note): string {
  const lines: string[] = [];

  lines.push(`id: ${note.id}`);
  lines.push(`title: "${escapeYamlString(note.title)}"`);
  lines.push(`pinned: ${note.pinned}`);

  const labels = visibleLabelNamesSorted(note);
  if (labels.length === 0) {
    lines.push("labels: []");
  } else {
    lines.push(`labels:\n${labels.map((name) => `  - "${escapeYamlString(name)}"`).join("\n")}`);
  }

  lines.push(`created_at: "${note.createdTime.toISOString()}"`);
  lines.push(`edited_at: "${note.editedTime.toISOString()}"`);

  return `---\n${lines.join("\n")}\n---`;
}

/**
 * Full file: frontmatter, the title as a heading when there is one, then the content.
 */
export function buildNoteMarkdown(note: Note): string {
  const parts = [buildFrontmatter(note), ""];
  if (note.title) {
    parts.push(`# ${note.title.replace(/[\r\n]+/g, " ")}`, "");
  }
  parts.push(noteMarkdown(note).replace(/\n$/, ""));
  return parts.join("\n") + "\n";
}

/**
 * Resolve a filename, appending the note id if the file belongs to another note.
 */
export function resolveFilename(title: string, id: number, existingId?: number | null): string {
  const base = sanitizeFilename(title);
  if (existingId !== undefined && existingId !== id) {
    return `${base}-${id}`;
  }
  return base;
}

const FRONTMATTER_BLOCK = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/;

/** Note id recorded in the leading frontmatter of `text`, or null for any other file. */
export function frontmatterNoteId(text: string): number | null {
  const block = FRONTMATTER_BLOCK.exec(text);
  if (!block) return null;
  const match = /^id: (\d+)$/m.exec(block[1]);
  return match ? Number(match[1]) : null;
}

async function readExistingId(path: string): Promise<number | null | undefined> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
  return frontmatterNoteId(text);
}

/**
 * First name from `note.title` that is free or already holds this note:
 * the title, then `title-id`, then `title-id-2`, `title-id-3`…
 */
async function claimFilename(
  note: Note,
  targetFolder: string,
  written: Map<string, number>,
): Promise<string> {
  const ownerOf = (name: string) =>
    written.has(name) ? written.get(name) : readExistingId(join(targetFolder, `${name}.md`));

  const base = resolveFilename(note.title, note.id);
  let owner = await ownerOf(base);
  let name = resolveFilename(note.title, note.id, owner);
  for (let n = 2; name !== base; n++) {
    owner = await ownerOf(name);
    if (owner === undefined || owner === note.id) break;
    name = `${base}-${note.id}-${n}`;
  }
  return name;
}

export interface ExportSummary {
  exported: number;
  skipped: number;
  errors: number;
}

/**
 * Write every note of `notes` to `targetFolder`.
 *
 * - Notes in the bin are skipped.
 * - A file already holding the same note is overwritten; a file holding
 *   another note (or a foreign file) keeps its name and the note gets an
 *   id suffix, numbered further until the name is free.
 * - Single-note failures are counted and logged, the export goes on.
 * - Aborting `signal` stops before the next note.
 */
export async function exportNotes(
  notes: Note[],
  targetFolder: string,
  signal?: AbortSignal,
): Promise<ExportSummary> {
  await mkdir(targetFolder, { recursive: true });

  const summary: ExportSummary = { exported: 0, skipped: 0, errors: 0 };
  // Names taken during this run, with the note that took them
  const written = new Map<string, number>();

  for (const note of notes) {
    if (signal?.aborted) break;

    if (note.deleted) {
      summary.skipped++;
      continue;
    }

    try {
      const finalName = await claimFilename(note, targetFolder, written);
      await writeFile(join(targetFolder, `${finalName}.md`), buildNoteMarkdown(note), "utf8");
      written.set(finalName, note.id);
      summary.exported++;
    } catch (err) {
      summary.errors++;
      log.error(`[export] failed to export note ${note.id}:`, err);
    }
  }

  if (signal?.aborted) {
    log.info(`[export] cancelled: ${summary.exported} exported, ${summary.skipped} skipped`);
  } else {
    log.info(
      `[export] complete: ${summary.exported} exported, ${summary.skipped} skipped, ${summary.errors} errors`,
    );
  }
  return summary;
}
