// INPUT: zod, node:fs/promises, node:path, logger.ts, types (SORT_METHODS, SortMethod)
// OUTPUT: Preferences, DEFAULT_PREFERENCES, LAYOUTS, SWIPE_ACTIONS, CONFIRMATIONS, parsePreferences, loadPreferences, savePreferences
// POS: Configuration layer — user preferences schema, defaults and persistence

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { log } from "./logger";
import { SORT_METHODS, type SortMethod } from "./types";

export const LAYOUTS = ["list", "grid"] as const;
export type Layout = (typeof LAYOUTS)[number];

export const SWIPE_ACTIONS = ["disabled", "delete", "togglePin", "share", "copy"] as const;
export type SwipeAction = (typeof SWIPE_ACTIONS)[number];

/** When to ask before pinning, deleting or restoring notes. */
export const CONFIRMATIONS = ["none", "irreversible", "all"] as const;
export type Confirmations = (typeof CONFIRMATIONS)[number];

export interface Preferences {
  sortMethod: SortMethod;
  sortAscending: boolean;
  layout: Layout;
  swipeActionRight: SwipeAction;
  swipeActionLeft: SwipeAction;
  confirmations: Confirmations;
  showTitlesOnly: boolean;
  showTitlesOnlyDisableInSearchView: boolean;
  showTilesBackground: boolean;
  disableSubduedNoteContentPreview: boolean;
  biggerTitles: boolean;
  enableLabels: boolean;
  showLabelsListOnNoteTile: boolean;
  showUndoRedoButtons: boolean;
  showChecklistButton: boolean;
  editorModeButton: boolean;
  encryptBackups: boolean;
}

export const DEFAULT_PREFERENCES: Preferences = {
  sortMethod: "editedDate",
  sortAscending: false,
  layout: "list",
  swipeActionRight: "delete",
  swipeActionLeft: "togglePin",
  confirmations: "irreversible",
  showTitlesOnly: false,
  showTitlesOnlyDisableInSearchView: true,
  showTilesBackground: false,
  disableSubduedNoteContentPreview: false,
  biggerTitles: false,
  enableLabels: true,
  showLabelsListOnNoteTile: true,
  showUndoRedoButtons: true,
  showChecklistButton: true,
  editorModeButton: false,
  encryptBackups: false,
};

// A missing key silently takes its default, a malformed one is reset with a warning
function resetTo<K extends keyof Preferences>(key: K) {
  return (ctx: { input: unknown }): Preferences[K] => {
    if (ctx.input !== undefined) {
      log.warn(`[preferences] resetting malformed "${key}" to its default`, ctx.input);
    }
    return DEFAULT_PREFERENCES[key];
  };
}

type FlagKey = {
  [K in keyof Preferences]: Preferences[K] extends boolean ? K : never;
}[keyof Preferences];

const flag = (key: FlagKey) => z.boolean().catch(resetTo(key));

const PreferencesSchema = z.object({
  sortMethod: z.enum(SORT_METHODS).catch(resetTo("sortMethod")),
  sortAscending: flag("sortAscending"),
  layout: z.enum(LAYOUTS).catch(resetTo("layout")),
  swipeActionRight: z.enum(SWIPE_ACTIONS).catch(resetTo("swipeActionRight")),
  swipeActionLeft: z.enum(SWIPE_ACTIONS).catch(resetTo("swipeActionLeft")),
  confirmations: z.enum(CONFIRMATIONS).catch(resetTo("confirmations")),
  showTitlesOnly: flag("showTitlesOnly"),
  showTitlesOnlyDisableInSearchView: flag("showTitlesOnlyDisableInSearchView"),
  showTilesBackground: flag("showTilesBackground"),
  disableSubduedNoteContentPreview: flag("disableSubduedNoteContentPreview"),
  biggerTitles: flag("biggerTitles"),
  enableLabels: flag("enableLabels"),
  showLabelsListOnNoteTile: flag("showLabelsListOnNoteTile"),
  showUndoRedoButtons: flag("showUndoRedoButtons"),
  showChecklistButton: flag("showChecklistButton"),
  editorModeButton: flag("editorModeButton"),
  encryptBackups: flag("encryptBackups"),
});

/** Validates stored preferences; unknown keys are dropped. */
export function parsePreferences(raw: unknown): Preferences {
  const isObject = typeof raw === "object" && raw !== null && !Array.isArray(raw);
  if (!isObject && raw !== undefined && raw !== null) {
    log.warn("[preferences] stored preferences are not an object, using defaults");
  }
  return PreferencesSchema.parse(isObject ? raw : {});
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadPreferences(path: string): Promise<Preferences> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return { ...DEFAULT_PREFERENCES };
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    log.warn(`[preferences] ${path} is not valid JSON, using defaults`, err);
    return { ...DEFAULT_PREFERENCES };
  }
  return parsePreferences(raw);
}

export async function savePreferences(path: string, preferences: Preferences): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(preferences, null, 2)}\n`, "utf8");
}
