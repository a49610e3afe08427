// INPUT: types (Label, Note)
// OUTPUT: compareLabels, visibleLabelsSorted, visibleLabelNamesSorted
// POS: Label views used by note tiles and exports

import type { Label, Note } from "./types";

export function compareLabels(a: Label, b: Label): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export function visibleLabelsSorted(note: Pick<Note, "labels">): Label[] {
  return note.labels.filter((label) => label.visible).sort(compareLabels);
}

export function visibleLabelNamesSorted(note: Pick<Note, "labels">): string[] {
  return visibleLabelsSorted(note).map((label) => label.name);
}
