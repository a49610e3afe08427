// INPUT: none
// OUTPUT: Note, Label, SortMethod, RichDocument, Line, Operation, Attribute, Embed, BlockType
// POS: Core data contracts for notes, labels and the rich-text document tree

export interface Label {
  name: string;
  visible: boolean;
}

export interface Note {
  id: number; // 0 until the store assigns one
  deleted: boolean;
  pinned: boolean;
  createdTime: Date;
  editedTime: Date; // also bumped by pin toggles
  title: string;
  content: string; // delta JSON
  labels: Label[];
}

export const SORT_METHODS = ["createdDate", "editedDate", "title"] as const;

export type SortMethod = (typeof SORT_METHODS)[number];

// ── Document tree ───────────────────────────────────────────────────

export const BLOCK_TYPES = ["ul", "ol", "cl", "quote", "code"] as const;

export type BlockType = (typeof BLOCK_TYPES)[number];

export const HEADING_LEVELS = [1, 2, 3, 4, 5, 6] as const;

export type HeadingLevel = (typeof HEADING_LEVELS)[number];

/**
 * Known attributes of a delta operation. Inline ones decorate a text run,
 * line ones are carried by the newline sentinel that ends a line.
 */
export type Attribute =
  | { kind: "bold" }
  | { kind: "italic" }
  | { kind: "underline" }
  | { kind: "strikethrough" }
  | { kind: "code" }
  | { kind: "link"; href: string }
  | { kind: "heading"; level: HeadingLevel }
  | { kind: "block"; block: BlockType }
  | { kind: "checked" };

export type InlineAttribute = Extract<
  Attribute,
  { kind: "bold" | "italic" | "underline" | "strikethrough" | "code" | "link" }
>;

export type LineAttribute = Extract<Attribute, { kind: "heading" | "block" | "checked" }>;

export type Embed =
  | { kind: "horizontalRule" }
  | { kind: "image"; source: string; sourceType: string }
  | { kind: "unknown"; type: string; data: Record<string, unknown> };

export type Operation =
  | { type: "text"; text: string; attributes: InlineAttribute[] }
  | { type: "embed"; embed: Embed };

export interface Line {
  operations: Operation[];
  attributes: LineAttribute[];
}

export interface RichDocument {
  lines: Line[];
}
