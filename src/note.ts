// INPUT: document.ts (EMPTY_CONTENT, parseDocument), content.ts (plainText, previewText), markdown.ts (documentToMarkdown)
// OUTPUT: emptyNote, noteWithContent, isTitleEmpty, isContentEmpty, contentPreview, isContentPreviewEmpty, isNoteEmpty, notePlainText, noteMarkdown, shareText
// POS: Note model helpers — factories and the derived views of a note

import { plainText, previewText } from "./content";
import { EMPTY_CONTENT, parseDocument } from "./document";
import { documentToMarkdown } from "./markdown";
import type { Note } from "./types";

/** Note with empty title and content, not yet stored. */
export function emptyNote(now: Date = new Date()): Note {
  return noteWithContent(EMPTY_CONTENT, now);
}

export function noteWithContent(content: string, now: Date = new Date()): Note {
  return {
    id: 0,
    deleted: false,
    pinned: false,
    createdTime: now,
    editedTime: now,
    title: "",
    content,
    labels: [],
  };
}

export function isTitleEmpty(note: Pick<Note, "title">): boolean {
  return note.title.length === 0;
}

/** Whether the stored content is exactly the content of a new note. */
export function isContentEmpty(note: Pick<Note, "content">): boolean {
  return note.content === EMPTY_CONTENT;
}

// The derived views below throw MalformedDocumentError on bad content.

export function contentPreview(note: Pick<Note, "content">): string {
  return previewText(parseDocument(note.content));
}

export function isContentPreviewEmpty(note: Pick<Note, "content">): boolean {
  return contentPreview(note).length === 0;
}

export function isNoteEmpty(note: Pick<Note, "title" | "content">): boolean {
  return isTitleEmpty(note) && isContentPreviewEmpty(note);
}

export function notePlainText(note: Pick<Note, "content">): string {
  return plainText(parseDocument(note.content));
}

export function noteMarkdown(note: Pick<Note, "content">): string {
  return documentToMarkdown(parseDocument(note.content));
}

/** Title and preview as one text, for the clipboard and the share sheet. */
export function shareText(note: Pick<Note, "title" | "content">): string {
  return `${note.title}\n\n${contentPreview(note)}`;
}
