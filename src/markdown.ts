// INPUT: document.ts (lineText, lineBlock, lineHeading, isLineChecked), types (RichDocument, Line, Operation, InlineAttribute, LineAttribute)
// OUTPUT: documentToMarkdown, markdownToDocument
// POS: Markdown codec for the rich-text document tree (export, share, import)

import { isLineChecked, lineBlock, lineHeading, lineText } from "./document";
import {
  HEADING_LEVELS,
  type Embed,
  type InlineAttribute,
  type Line,
  type LineAttribute,
  type Operation,
  type RichDocument,
} from "./types";

const CODE_FENCE = "```";
const HORIZONTAL_RULE = "---";

// Every backslash is escaped too, so "\x" always means a literal "x"
const INLINE_SPECIAL = /[\\*_~`[\]]/g;
const HREF_SPECIAL = /[\\)]/g;

function escapeInline(text: string): string {
  return text.replace(INLINE_SPECIAL, "\\$&");
}

function escapeHref(href: string): string {
  return href.replace(HREF_SPECIAL, "\\$&");
}

/**
 * Escape what would otherwise be read as a line prefix
 * (heading, quote, list item, horizontal rule).
 */
function escapeLineStart(content: string): string {
  if (/^[#>\-+]/.test(content)) return `\\${content}`;
  return content.replace(/^(\d+)\./, "$1\\.");
}

// ── Encoding ────────────────────────────────────────────────────────

function has(attributes: InlineAttribute[], kind: InlineAttribute["kind"]): boolean {
  return attributes.some((attribute) => attribute.kind === kind);
}

/**
 * Wrap a run in its markers. Openers go outermost-first (link, bold,
 * italic, strikethrough, code) and closers in reverse, which keeps the
 * toggling parser below unambiguous. Underline has no markdown form.
 */
function encodeRun(text: string, attributes: InlineAttribute[]): string {
  let open = "";
  let close = "";
  const link = attributes.find((attribute) => attribute.kind === "link");
  if (link) {
    open += "[";
  }
  if (has(attributes, "bold")) {
    open += "**";
    close = "**" + close;
  }
  if (has(attributes, "italic")) {
    open += "_";
    close = "_" + close;
  }
  if (has(attributes, "strikethrough")) {
    open += "~~";
    close = "~~" + close;
  }
  if (has(attributes, "code")) {
    open += "`";
    close = "`" + close;
  }
  if (link) {
    close += `](${escapeHref(link.href)})`;
  }
  return `${open}${escapeInline(text)}${close}`;
}

function encodeEmbed(embed: Embed): string | null {
  switch (embed.kind) {
    case "horizontalRule":
      return HORIZONTAL_RULE;
    case "image":
      return `![](${escapeHref(embed.source)})`;
    case "unknown":
      return null;
  }
}

function linePrefix(line: Line, orderedIndex: number): string {
  const heading = lineHeading(line);
  const headingPrefix = heading ? `${"#".repeat(heading)} ` : "";
  switch (lineBlock(line)) {
    case "ul":
      return `* ${headingPrefix}`;
    case "ol":
      return `${orderedIndex}. ${headingPrefix}`;
    case "cl":
      return `- [${isLineChecked(line) ? "x" : " "}] ${headingPrefix}`;
    case "quote":
      return `> ${headingPrefix}`;
    default:
      return headingPrefix;
  }
}

/** Markdown lines for a non-code line; embeds are pulled out onto lines of their own. */
function encodeLine(line: Line, orderedIndex: number): string[] {
  const output: string[] = [];
  let runs: Operation[] = [];

  const flushRuns = () => {
    const content = runs
      .map((run) => (run.type === "text" ? encodeRun(run.text, run.attributes) : ""))
      .join("");
    output.push(linePrefix(line, orderedIndex) + escapeLineStart(content));
    runs = [];
  };

  const hasEmbed = line.operations.some((operation) => operation.type === "embed");
  for (const operation of line.operations) {
    if (operation.type === "text") {
      runs.push(operation);
      continue;
    }
    if (runs.length > 0) flushRuns();
    const encoded = encodeEmbed(operation.embed);
    if (encoded !== null) output.push(encoded);
  }

  if (runs.length > 0 || !hasEmbed) flushRuns();
  return output;
}

export function documentToMarkdown(document: RichDocument): string {
  const output: string[] = [];
  let orderedIndex = 0;
  let inCode = false;

  for (const line of document.lines) {
    const block = lineBlock(line);

    if (block === "code") {
      if (!inCode) output.push(CODE_FENCE);
      inCode = true;
      orderedIndex = 0;
      output.push(lineText(line));
      continue;
    }
    if (inCode) {
      output.push(CODE_FENCE);
      inCode = false;
    }

    orderedIndex = block === "ol" ? orderedIndex + 1 : 0;
    output.push(...encodeLine(line, orderedIndex));
  }
  if (inCode) output.push(CODE_FENCE);

  return output.length > 0 ? `${output.join("\n")}\n` : "";
}

// ── Decoding ────────────────────────────────────────────────────────

interface PendingRun {
  text: string;
  bold: boolean;
  italic: boolean;
  strikethrough: boolean;
  code: boolean;
  href: string | null;
}

function runAttributes(run: PendingRun): InlineAttribute[] {
  const attributes: InlineAttribute[] = [];
  if (run.bold) attributes.push({ kind: "bold" });
  if (run.italic) attributes.push({ kind: "italic" });
  if (run.strikethrough) attributes.push({ kind: "strikethrough" });
  if (run.code) attributes.push({ kind: "code" });
  if (run.href !== null) attributes.push({ kind: "link", href: run.href });
  return attributes;
}

/** Every marker toggles its style; a backslash makes the next character literal. */
function decodeInline(source: string): Operation[] {
  const runs: PendingRun[] = [];
  const style = { bold: false, italic: false, strikethrough: false, code: false };
  let linkStart: number | null = null;
  let buffer = "";

  const flush = () => {
    if (buffer) runs.push({ ...style, text: buffer, href: null });
    buffer = "";
  };

  let i = 0;
  while (i < source.length) {
    const char = source[i];
    if (char === "\\" && i + 1 < source.length) {
      buffer += source[i + 1];
      i += 2;
    } else if (source.startsWith("**", i)) {
      flush();
      style.bold = !style.bold;
      i += 2;
    } else if (source.startsWith("~~", i)) {
      flush();
      style.strikethrough = !style.strikethrough;
      i += 2;
    } else if (char === "_") {
      flush();
      style.italic = !style.italic;
      i += 1;
    } else if (char === "`") {
      flush();
      style.code = !style.code;
      i += 1;
    } else if (char === "[" && linkStart === null) {
      flush();
      linkStart = runs.length;
      i += 1;
    } else if (source.startsWith("](", i) && linkStart !== null) {
      flush();
      let href = "";
      let j = i + 2;
      while (j < source.length && source[j] !== ")") {
        if (source[j] === "\\" && j + 1 < source.length) j += 1;
        href += source[j];
        j += 1;
      }
      for (const run of runs.slice(linkStart)) run.href = href;
      linkStart = null;
      i = j + 1;
    } else {
      buffer += char;
      i += 1;
    }
  }
  flush();

  const operations: Operation[] = [];
  for (const run of runs) {
    const attributes = runAttributes(run);
    const previous = operations[operations.length - 1];
    if (previous?.type === "text" && JSON.stringify(previous.attributes) === JSON.stringify(attributes)) {
      operations[operations.length - 1] = { ...previous, text: previous.text + run.text };
    } else {
      operations.push({ type: "text", text: run.text, attributes });
    }
  }
  return operations;
}

function unescapeHref(source: string): string {
  return source.replace(/\\(.)/g, "$1");
}

function decodeHeading(content: string): { heading: LineAttribute[]; rest: string } {
  const match = /^(#{1,6}) (.*)$/.exec(content);
  if (!match) return { heading: [], rest: content };
  const level = HEADING_LEVELS.find((candidate) => candidate === match[1].length);
  const heading: LineAttribute[] = level === undefined ? [] : [{ kind: "heading", level }];
  return { heading, rest: match[2] };
}

function decodeLine(source: string): Line {
  if (/^(-{3,}|\*{3,})$/.test(source)) {
    return { operations: [{ type: "embed", embed: { kind: "horizontalRule" } }], attributes: [] };
  }

  const image = /^!\[[^\]]*\]\((.*)\)$/.exec(source);
  if (image) {
    return {
      operations: [
        { type: "embed", embed: { kind: "image", source: unescapeHref(image[1]), sourceType: "url" } },
      ],
      attributes: [],
    };
  }

  let block: LineAttribute[] = [];
  let content = source;

  const checklist = /^[-*+] \[([ xX])\] ?(.*)$/.exec(source);
  const bullet = /^[-*+] (.*)$/.exec(source);
  const ordered = /^\d+\. (.*)$/.exec(source);
  const quote = /^> ?(.*)$/.exec(source);

  if (checklist) {
    block = [{ kind: "block", block: "cl" }];
    if (checklist[1] !== " ") block.push({ kind: "checked" });
    content = checklist[2];
  } else if (bullet) {
    block = [{ kind: "block", block: "ul" }];
    content = bullet[1];
  } else if (ordered) {
    block = [{ kind: "block", block: "ol" }];
    content = ordered[1];
  } else if (quote) {
    block = [{ kind: "block", block: "quote" }];
    content = quote[1];
  }

  const { heading, rest } = decodeHeading(content);
  // Line attributes keep the order the delta codec writes them in
  return { operations: decodeInline(rest), attributes: [...heading, ...block] };
}

/**
 * Parse markdown written by {@link documentToMarkdown} (and the common
 * subset of hand-written markdown) back into a document.
 */
export function markdownToDocument(markdown: string): RichDocument {
  if (markdown === "") return { lines: [] };

  const sourceLines = markdown.split("\n");
  if (markdown.endsWith("\n")) sourceLines.pop();

  const lines: Line[] = [];
  let inCode = false;

  for (const source of sourceLines) {
    if (source.startsWith(CODE_FENCE)) {
      inCode = !inCode;
      continue;
    }
    if (inCode) {
      lines.push({
        operations: source ? [{ type: "text", text: source, attributes: [] }] : [],
        attributes: [{ kind: "block", block: "code" }],
      });
      continue;
    }
    lines.push(decodeLine(source));
  }

  return { lines };
}
