// INPUT: types (Note, SortMethod)
// OUTPUT: InvalidSortMethodError, compareNotes, noteComparator, sortNotes
// POS: Note ordering — pinned notes first, then the sort method chosen by the user

import type { Note, SortMethod } from "./types";

// ── InvalidSortMethodError ──────────────────────────────────────────
// A sort method outside SortMethod reached the comparator. Never defaulted.

export class InvalidSortMethodError extends Error {
  constructor(public readonly sortMethod: unknown) {
    super(`The sort method is not valid: ${String(sortMethod)}`);
    this.name = "InvalidSortMethodError";
  }
}

type Ordering = -1 | 0 | 1;

function compareValues(a: number | string, b: number | string): Ordering {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function reverse(ordering: Ordering): Ordering {
  return ordering === 0 ? 0 : ordering === 1 ? -1 : 1;
}

/**
 * Notes are sorted according to:
 *   1. Their pin state.
 *   2. The sort method and direction chosen by the user.
 *
 * Titles compare by UTF-16 code units, not by locale, so the order is the
 * same on every device.
 */
export function compareNotes(
  a: Note,
  b: Note,
  sortMethod: SortMethod,
  ascending: boolean,
): Ordering {
  if (a.pinned && !b.pinned) return -1;
  if (!a.pinned && b.pinned) return 1;

  let ordering: Ordering;
  switch (sortMethod) {
    case "createdDate":
      ordering = compareValues(a.createdTime.getTime(), b.createdTime.getTime());
      break;
    case "editedDate":
      ordering = compareValues(a.editedTime.getTime(), b.editedTime.getTime());
      break;
    case "title":
      ordering = compareValues(a.title, b.title);
      break;
    default:
      throw new InvalidSortMethodError(sortMethod);
  }

  return ascending ? ordering : reverse(ordering);
}

export function noteComparator(
  sortMethod: SortMethod,
  ascending: boolean,
): (a: Note, b: Note) => Ordering {
  return (a, b) => compareNotes(a, b, sortMethod, ascending);
}

/** Sorted copy of `notes`; ties keep their input order. */
export function sortNotes(notes: readonly Note[], sortMethod: SortMethod, ascending: boolean): Note[] {
  return [...notes].sort(noteComparator(sortMethod, ascending));
}
