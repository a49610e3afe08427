import { describe, it, expect } from "vitest";
import { InvalidSortMethodError, compareNotes, noteComparator, sortNotes } from "../src/sort";
import { SORT_METHODS, type Note, type SortMethod } from "../src/types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeNote(overrides: Partial<Note> = {}): Note {
  return {
    id: 1,
    deleted: false,
    pinned: false,
    createdTime: new Date("2024-01-15T10:00:00Z"),
    editedTime: new Date("2024-01-16T12:00:00Z"),
    title: "Note",
    content: '[{"insert":"\\n"}]',
    labels: [],
    ...overrides,
  };
}

const notes = [
  makeNote({ id: 1, title: "banana", createdTime: new Date("2024-03-01"), editedTime: new Date("2024-03-05") }),
  makeNote({ id: 2, title: "Apple", createdTime: new Date("2024-01-01"), editedTime: new Date("2024-03-09") }),
  makeNote({ id: 3, title: "cherry", createdTime: new Date("2024-02-01"), editedTime: new Date("2024-03-01") }),
  makeNote({ id: 4, title: "apple", createdTime: new Date("2024-02-01"), editedTime: new Date("2024-03-01"), pinned: true }),
];

// A sort method read back from storage without validation
function storedSortMethod(value: string): SortMethod {
  const parsed: { sortMethod: SortMethod } = JSON.parse(JSON.stringify({ sortMethod: value }));
  return parsed.sortMethod;
}

const ids = (sorted: Note[]) => sorted.map((note) => note.id);

// ---------------------------------------------------------------------------
// compareNotes
// ---------------------------------------------------------------------------

describe("compareNotes", () => {
  it("puts pinned notes first whatever the method and direction", () => {
    const pinned = makeNote({ pinned: true, title: "z", createdTime: new Date("2030-01-01") });
    const other = makeNote({ title: "a", createdTime: new Date("2000-01-01") });
    for (const method of SORT_METHODS) {
      for (const ascending of [true, false]) {
        expect(compareNotes(pinned, other, method, ascending)).toBe(-1);
        expect(compareNotes(other, pinned, method, ascending)).toBe(1);
      }
    }
  });

  it("compares creation dates", () => {
    const older = makeNote({ createdTime: new Date("2024-01-01") });
    const newer = makeNote({ createdTime: new Date("2024-06-01") });
    expect(compareNotes(older, newer, "createdDate", true)).toBe(-1);
    expect(compareNotes(older, newer, "createdDate", false)).toBe(1);
  });

  it("compares edition dates", () => {
    const older = makeNote({ editedTime: new Date("2024-01-01") });
    const newer = makeNote({ editedTime: new Date("2024-06-01") });
    expect(compareNotes(newer, older, "editedDate", true)).toBe(1);
    expect(compareNotes(newer, older, "editedDate", false)).toBe(-1);
  });

  it("compares titles by code unit", () => {
    expect(compareNotes(makeNote({ title: "B" }), makeNote({ title: "a" }), "title", true)).toBe(-1);
    expect(compareNotes(makeNote({ title: "a" }), makeNote({ title: "ab" }), "title", true)).toBe(-1);
  });

  it("returns 0 for ties", () => {
    const a = makeNote({ id: 1 });
    const b = makeNote({ id: 2 });
    for (const method of SORT_METHODS) {
      expect(compareNotes(a, b, method, true)).toBe(0);
      expect(compareNotes(a, b, method, false)).toBe(0);
    }
  });

  it("reverses the sign when the direction flips", () => {
    for (const method of SORT_METHODS) {
      for (const a of notes) {
        for (const b of notes) {
          if (a.pinned !== b.pinned) continue;
          expect(compareNotes(a, b, method, false)).toBe(-compareNotes(a, b, method, true) || 0);
        }
      }
    }
  });

  it("is antisymmetric and transitive", () => {
    for (const method of SORT_METHODS) {
      for (const ascending of [true, false]) {
        for (const a of notes) {
          expect(compareNotes(a, a, method, ascending)).toBe(0);
          for (const b of notes) {
            expect(compareNotes(a, b, method, ascending)).toBe(-compareNotes(b, a, method, ascending) || 0);
            for (const c of notes) {
              if (compareNotes(a, b, method, ascending) <= 0 && compareNotes(b, c, method, ascending) <= 0) {
                expect(compareNotes(a, c, method, ascending)).toBeLessThanOrEqual(0);
              }
            }
          }
        }
      }
    }
  });

  it("throws on an unknown sort method", () => {
    const method = storedSortMethod("size");
    expect(() => compareNotes(makeNote(), makeNote(), method, true)).toThrow(InvalidSortMethodError);
    expect(() => compareNotes(makeNote(), makeNote(), method, true)).toThrow("The sort method is not valid: size");
  });

  it("does not check the method when pin states differ", () => {
    const method = storedSortMethod("size");
    expect(compareNotes(makeNote({ pinned: true }), makeNote(), method, true)).toBe(-1);
  });
});

// ---------------------------------------------------------------------------
// sortNotes
// ---------------------------------------------------------------------------

describe("sortNotes", () => {
  it("sorts by edition date, newest first", () => {
    expect(ids(sortNotes(notes, "editedDate", false))).toEqual([4, 2, 1, 3]);
  });

  it("sorts by creation date, oldest first", () => {
    expect(ids(sortNotes(notes, "createdDate", true))).toEqual([4, 2, 3, 1]);
  });

  it("sorts by title", () => {
    expect(ids(sortNotes(notes, "title", true))).toEqual([4, 2, 1, 3]);
    expect(ids(sortNotes(notes, "title", false))).toEqual([4, 3, 1, 2]);
  });

  it("keeps the input order of ties", () => {
    const tied = [makeNote({ id: 7 }), makeNote({ id: 5 }), makeNote({ id: 6 })];
    expect(ids(sortNotes(tied, "createdDate", false))).toEqual([7, 5, 6]);
  });

  it("does not modify its input", () => {
    const input = [...notes];
    sortNotes(input, "title", true);
    expect(ids(input)).toEqual([1, 2, 3, 4]);
  });

  it("exposes a comparator for Array.prototype.sort", () => {
    expect(ids([...notes].sort(noteComparator("createdDate", false)))).toEqual([4, 1, 3, 2]);
  });
});
