// INPUT: settings.ts (Confirmations, Preferences), types (Note)
// OUTPUT: MenuOption, MenuEntry, NoteAction, editorMenuOptions, editorToolbar, requiresConfirmation
// POS: Editor app bar — menu entries, toolbar buttons and confirmation rules for note actions

import type { Confirmations, Preferences } from "./settings";
import type { Note } from "./types";

export type MenuOption =
  | "togglePin"
  | "selectLabels"
  | "copy"
  | "share"
  | "delete"
  | "restore"
  | "deletePermanently"
  | "about";

export type MenuEntry = MenuOption | "divider";

/** Menu of the editor; notes in the bin can only be restored or deleted for good. */
export function editorMenuOptions(note: Pick<Note, "deleted">, enableLabels: boolean): MenuEntry[] {
  if (note.deleted) {
    return ["restore", "deletePermanently", "divider", "about"];
  }
  return [
    "copy",
    "share",
    "divider",
    "togglePin",
    ...(enableLabels ? (["selectLabels"] as const) : []),
    "delete",
    "divider",
    "about",
  ];
}

export interface EditorToolbar {
  undoRedo: boolean;
  checklist: boolean;
  editorMode: boolean;
}

export function editorToolbar(
  note: Pick<Note, "deleted">,
  preferences: Pick<Preferences, "showUndoRedoButtons" | "showChecklistButton" | "editorModeButton">,
): EditorToolbar {
  if (note.deleted) {
    return { undoRedo: false, checklist: false, editorMode: false };
  }
  return {
    undoRedo: preferences.showUndoRedoButtons,
    checklist: preferences.showChecklistButton,
    editorMode: preferences.editorModeButton,
  };
}

export type NoteAction = "togglePin" | "delete" | "restore" | "deletePermanently" | "emptyBin";

const IRREVERSIBLE: ReadonlySet<NoteAction> = new Set(["deletePermanently", "emptyBin"]);

export function requiresConfirmation(action: NoteAction, confirmations: Confirmations): boolean {
  switch (confirmations) {
    case "none":
      return false;
    case "irreversible":
      return IRREVERSIBLE.has(action);
    case "all":
      return true;
  }
}
