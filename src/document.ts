// INPUT: zod, types (RichDocument, Line, Operation, Attribute, Embed)
// OUTPUT: EMPTY_CONTENT, MalformedDocumentError, parseDocument, serializeDocument, lineText, lineBlock, lineHeading, isLineChecked
// POS: Delta codec — parses stored content into the typed document tree and back

import { z } from "zod";
import {
  BLOCK_TYPES,
  HEADING_LEVELS,
  type BlockType,
  type Embed,
  type HeadingLevel,
  type InlineAttribute,
  type Line,
  type LineAttribute,
  type Operation,
  type RichDocument,
} from "./types";

/** Content of a note with nothing typed in it. */
export const EMPTY_CONTENT = '[{"insert":"\\n"}]';

// ── MalformedDocumentError ──────────────────────────────────────────
// Content that is not a delta array. Never replaced by empty content:
// the caller decides what to show.

export class MalformedDocumentError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "MalformedDocumentError";
  }
}

// ── Wire schema ─────────────────────────────────────────────────────

const RawEmbedSchema = z.object({ _type: z.string() }).passthrough();

const RawOperationSchema = z.object({
  insert: z.union([z.string(), RawEmbedSchema]),
  attributes: z.record(z.unknown()).optional(),
});

const RawDeltaSchema = z.array(RawOperationSchema);

type RawEmbed = z.infer<typeof RawEmbedSchema>;

export interface RawOperation {
  insert: string | Record<string, unknown>;
  attributes?: Record<string, unknown>;
}

// ── Attributes ──────────────────────────────────────────────────────
// Unknown keys (colours, indent, alignment...) are dropped.

function parseInlineAttributes(raw: Record<string, unknown> | undefined): InlineAttribute[] {
  if (!raw) return [];
  const attributes: InlineAttribute[] = [];
  if (raw.b === true) attributes.push({ kind: "bold" });
  if (raw.i === true) attributes.push({ kind: "italic" });
  if (raw.u === true) attributes.push({ kind: "underline" });
  if (raw.s === true) attributes.push({ kind: "strikethrough" });
  if (raw.c === true) attributes.push({ kind: "code" });
  if (typeof raw.a === "string") attributes.push({ kind: "link", href: raw.a });
  return attributes;
}

function parseLineAttributes(raw: Record<string, unknown> | undefined): LineAttribute[] {
  if (!raw) return [];
  const attributes: LineAttribute[] = [];
  const level = HEADING_LEVELS.find((candidate) => candidate === raw.heading);
  if (level !== undefined) attributes.push({ kind: "heading", level });
  const block = BLOCK_TYPES.find((candidate) => candidate === raw.block);
  if (block !== undefined) attributes.push({ kind: "block", block });
  // Unchecked items drop the key; a stored false reads as unchecked
  if (raw.checked === true) attributes.push({ kind: "checked" });
  return attributes;
}

function parseEmbed(raw: RawEmbed): Embed {
  switch (raw._type) {
    case "hr":
      return { kind: "horizontalRule" };
    case "image":
      if (typeof raw.source === "string") {
        return {
          kind: "image",
          source: raw.source,
          sourceType: typeof raw.source_type === "string" ? raw.source_type : "url",
        };
      }
      break;
  }
  return { kind: "unknown", type: raw._type, data: { ...raw } };
}

function inlineAttributesToJson(attributes: InlineAttribute[]): Record<string, unknown> | undefined {
  if (attributes.length === 0) return undefined;
  const json: Record<string, unknown> = {};
  for (const attribute of attributes) {
    switch (attribute.kind) {
      case "bold":
        json.b = true;
        break;
      case "italic":
        json.i = true;
        break;
      case "underline":
        json.u = true;
        break;
      case "strikethrough":
        json.s = true;
        break;
      case "code":
        json.c = true;
        break;
      case "link":
        json.a = attribute.href;
        break;
    }
  }
  return json;
}

function lineAttributesToJson(attributes: LineAttribute[]): Record<string, unknown> | undefined {
  if (attributes.length === 0) return undefined;
  const json: Record<string, unknown> = {};
  for (const attribute of attributes) {
    switch (attribute.kind) {
      case "heading":
        json.heading = attribute.level;
        break;
      case "block":
        json.block = attribute.block;
        break;
      case "checked":
        json.checked = true;
        break;
    }
  }
  return json;
}

function embedToJson(embed: Embed): Record<string, unknown> {
  switch (embed.kind) {
    case "horizontalRule":
      return { _type: "hr", _inline: false };
    case "image":
      return { _type: "image", _inline: false, source_type: embed.sourceType, source: embed.source };
    case "unknown":
      return { ...embed.data };
  }
}

function sameAttributes(a: InlineAttribute[], b: InlineAttribute[]): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/** Appends a run to a line, merging it into the previous run when their styles match. */
function pushOperation(operations: Operation[], operation: Operation): void {
  const previous = operations[operations.length - 1];
  if (
    operation.type === "text" &&
    previous?.type === "text" &&
    sameAttributes(previous.attributes, operation.attributes)
  ) {
    operations[operations.length - 1] = {
      ...previous,
      text: previous.text + operation.text,
    };
    return;
  }
  operations.push(operation);
}

// ── parseDocument ───────────────────────────────────────────────────
// First pass of the flattener: splits the flat operation list into lines
// on every newline. The newline that ends a line carries its block-level
// attributes (checklist, heading...), which are attached to the line itself.

export function parseDocument(content: string): RichDocument {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new MalformedDocumentError("Content is not valid JSON", err);
  }

  const result = RawDeltaSchema.safeParse(json);
  if (!result.success) {
    throw new MalformedDocumentError(
      `Content is not a delta: ${result.error.issues[0]?.message ?? "invalid"}`,
      result.error,
    );
  }

  const lines: Line[] = [];
  let current: Operation[] = [];

  for (const raw of result.data) {
    if (typeof raw.insert !== "string") {
      pushOperation(current, { type: "embed", embed: parseEmbed(raw.insert) });
      continue;
    }

    const inline = parseInlineAttributes(raw.attributes);
    const parts = raw.insert.split("\n");
    parts.forEach((part, index) => {
      if (part) {
        pushOperation(current, { type: "text", text: part, attributes: inline });
      }
      if (index < parts.length - 1) {
        lines.push({ operations: current, attributes: parseLineAttributes(raw.attributes) });
        current = [];
      }
    });
  }

  // Trailing text without a closing newline still forms a line
  if (current.length > 0) {
    lines.push({ operations: current, attributes: [] });
  }

  return { lines };
}

// ── serializeDocument ───────────────────────────────────────────────

export function serializeDocument(document: RichDocument): string {
  const operations: RawOperation[] = [];

  const push = (operation: RawOperation) => {
    const previous = operations[operations.length - 1];
    if (
      previous &&
      typeof previous.insert === "string" &&
      typeof operation.insert === "string" &&
      JSON.stringify(previous.attributes) === JSON.stringify(operation.attributes)
    ) {
      previous.insert += operation.insert;
      return;
    }
    operations.push(operation);
  };

  for (const line of document.lines) {
    for (const operation of line.operations) {
      if (operation.type === "text") {
        const attributes = inlineAttributesToJson(operation.attributes);
        push(attributes ? { insert: operation.text, attributes } : { insert: operation.text });
      } else {
        push({ insert: embedToJson(operation.embed) });
      }
    }
    const attributes = lineAttributesToJson(line.attributes);
    push(attributes ? { insert: "\n", attributes } : { insert: "\n" });
  }

  return JSON.stringify(operations);
}

// ── Line helpers ────────────────────────────────────────────────────

/** Text of the line's runs, embeds excluded. */
export function lineText(line: Line): string {
  return line.operations
    .map((operation) => (operation.type === "text" ? operation.text : ""))
    .join("");
}

export function lineBlock(line: Line): BlockType | null {
  for (const attribute of line.attributes) {
    if (attribute.kind === "block") return attribute.block;
  }
  return null;
}

export function lineHeading(line: Line): HeadingLevel | null {
  for (const attribute of line.attributes) {
    if (attribute.kind === "heading") return attribute.level;
  }
  return null;
}

export function isLineChecked(line: Line): boolean {
  return line.attributes.some((attribute) => attribute.kind === "checked");
}
