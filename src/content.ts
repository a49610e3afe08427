// INPUT: document.ts (lineText, lineBlock, isLineChecked), types (RichDocument, Line)
// OUTPUT: CHECKED_GLYPH, UNCHECKED_GLYPH, plainText, previewText
// POS: Rich-content flattener — derives plain text and tile previews from a parsed document

import { isLineChecked, lineBlock, lineText } from "./document";
import type { Line, RichDocument } from "./types";

export const CHECKED_GLYPH = "✅";
export const UNCHECKED_GLYPH = "⬜";

/**
 * Text of every line joined by newlines. Embeds (images, horizontal
 * rules) have no textual fallback and contribute nothing.
 */
export function plainText(document: RichDocument): string {
  return document.lines.map(lineText).join("\n");
}

function previewLine(line: Line): string {
  const text = lineText(line);
  if (lineBlock(line) === "cl") {
    return `${isLineChecked(line) ? CHECKED_GLYPH : UNCHECKED_GLYPH} ${text}`;
  }
  return text;
}

/**
 * Content shown under the title of a note tile.
 *
 * Checklist items get a checked or unchecked glyph, horizontal rules are
 * skipped, and surrounding whitespace is trimmed.
 */
export function previewText(document: RichDocument): string {
  return document.lines.map(previewLine).join("\n").trim();
}
