import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { BackupError } from "../src/backup";
import { NotesApp, type NotesAppPorts } from "../src/main";
import { SqliteNotesRepository } from "../src/repository";
import { DEFAULT_PREFERENCES, type Preferences } from "../src/settings";
import type { Note } from "../src/types";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CONTENT = '[{"insert":"Buy milk"},{"insert":"\\n","attributes":{"block":"cl"}}]';

function makeClock(start = Date.parse("2024-05-01T00:00:00Z")) {
  let current = start;
  return () => {
    current += 60_000;
    return new Date(current);
  };
}

async function makeApp(preferences: Partial<Preferences> = {}, ports: NotesAppPorts = {}) {
  const repository = await SqliteNotesRepository.open();
  const confirm = vi.fn<NonNullable<NotesAppPorts["confirm"]>>().mockResolvedValue(true);
  const clipboard = vi.fn<NonNullable<NotesAppPorts["clipboard"]>>().mockResolvedValue(undefined);
  const share = vi.fn<NonNullable<NotesAppPorts["share"]>>().mockResolvedValue(undefined);
  const app = new NotesApp(
    repository,
    { ...DEFAULT_PREFERENCES, ...preferences },
    { confirm, clipboard, share, now: makeClock(), ...ports },
  );
  return { app, repository, confirm, clipboard, share };
}

function write(app: NotesApp, title: string, content = CONTENT): Note {
  return app.saveNote({ ...app.createNote(), title, content });
}

let repositories: SqliteNotesRepository[] = [];

beforeEach(() => {
  repositories = [];
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  for (const repository of repositories) repository.close();
  vi.restoreAllMocks();
});

async function setup(preferences: Partial<Preferences> = {}, ports: NotesAppPorts = {}) {
  const made = await makeApp(preferences, ports);
  repositories.push(made.repository);
  return made;
}

const titles = (notes: Note[]) => notes.map((note) => note.title);

// ---------------------------------------------------------------------------
// Lists
// ---------------------------------------------------------------------------

describe("NotesApp lists", () => {
  it("lists notes with the sort preferences, pinned first", async () => {
    const { app } = await setup();
    write(app, "first");
    const second = write(app, "second");
    write(app, "third");
    await app.togglePin(second.id);

    expect(titles(app.listNotes())).toEqual(["second", "third", "first"]);

    app.preferences = { ...app.preferences, sortMethod: "title", sortAscending: true };
    expect(titles(app.listNotes())).toEqual(["second", "first", "third"]);
  });

  it("keeps deleted notes in the bin", async () => {
    const { app } = await setup();
    const note = write(app, "old");
    write(app, "new");
    await app.deleteNote(note.id);

    expect(titles(app.listNotes())).toEqual(["new"]);
    expect(titles(app.listBin())).toEqual(["old"]);
  });

  it("searches titles and text, ignoring case", async () => {
    const { app } = await setup();
    write(app, "Groceries");
    write(app, "Errands", '[{"insert":"call the bank\\n"}]');
    const binned = write(app, "Bank statement");
    await app.deleteNote(binned.id);

    expect(titles(app.search("BANK"))).toEqual(["Errands"]);
    expect(titles(app.search("milk"))).toEqual(["Groceries"]);
    expect(app.search("  ")).toEqual([]);
  });

  it("skips unreadable content when searching", async () => {
    const { app } = await setup();
    write(app, "Broken", "{");
    write(app, "Fine", '[{"insert":"broken glass\\n"}]');
    expect(titles(app.search("broken"))).toEqual(["Fine", "Broken"]);
    expect(titles(app.search("glass"))).toEqual(["Fine"]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Editing
// ---------------------------------------------------------------------------

describe("NotesApp editing", () => {
  it("creates and saves notes, bumping the edited time", async () => {
    const { app, repository } = await setup();
    const created = app.createNote();
    expect(created.id).toBe(1);
    expect(created.createdTime.toISOString()).toBe("2024-05-01T00:01:00.000Z");

    const saved = app.saveNote({ ...created, title: "Hi" });
    expect(saved.editedTime.toISOString()).toBe("2024-05-01T00:02:00.000Z");
    expect(repository.getNote(created.id)).toEqual(saved);
  });

  it("selects existing labels only", async () => {
    const { app, repository } = await setup();
    repository.putLabel({ name: "work", visible: true });
    const note = write(app, "Plan");

    expect(app.selectLabels(note.id, ["work"]).labels).toEqual([{ name: "work", visible: true }]);
    expect(() => app.selectLabels(note.id, ["work", "play"])).toThrow("Unknown labels: play");
  });
});

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

describe("NotesApp actions", () => {
  it("toggles the pin and bumps the edited time", async () => {
    const { app, repository, confirm } = await setup();
    const note = write(app, "Pin me");
    expect(await app.togglePin(note.id)).toBe(true);

    const stored = repository.getNote(note.id);
    expect(stored?.pinned).toBe(true);
    expect(stored?.editedTime.getTime()).toBeGreaterThan(note.editedTime.getTime());
    expect(confirm).not.toHaveBeenCalled();
  });

  it("asks before deleting permanently", async () => {
    const { app, repository, confirm } = await setup();
    const note = write(app, "Gone");
    confirm.mockResolvedValueOnce(false);

    expect(await app.permanentlyDeleteNote(note.id)).toBe(false);
    expect(repository.getNote(note.id)).not.toBeNull();
    expect(confirm).toHaveBeenCalledWith("deletePermanently", repository.getNote(note.id));

    expect(await app.permanentlyDeleteNote(note.id)).toBe(true);
    expect(repository.getNote(note.id)).toBeNull();
  });

  it("asks before every action when configured", async () => {
    const { app, confirm } = await setup({ confirmations: "all" });
    const note = write(app, "Careful");
    confirm.mockResolvedValue(false);

    expect(await app.deleteNote(note.id)).toBe(false);
    expect(await app.togglePin(note.id)).toBe(false);
    expect(titles(app.listNotes())).toEqual(["Careful"]);
    expect(confirm).toHaveBeenCalledTimes(2);
  });

  it("restores notes from the bin", async () => {
    const { app } = await setup();
    const note = write(app, "Back");
    await app.deleteNote(note.id);
    expect(await app.restoreNote(note.id)).toBe(true);
    expect(titles(app.listNotes())).toEqual(["Back"]);
  });

  it("empties the bin after confirmation", async () => {
    const { app, confirm } = await setup();
    const a = write(app, "a");
    write(app, "b");
    expect(await app.emptyBin()).toBe(false);
    expect(confirm).not.toHaveBeenCalled();

    await app.deleteNote(a.id);
    expect(await app.emptyBin()).toBe(true);
    expect(confirm).toHaveBeenCalledWith("emptyBin", null);
    expect(app.listBin()).toEqual([]);
    expect(titles(app.listNotes())).toEqual(["b"]);
  });

  it("copies and shares the title and preview", async () => {
    const { app, clipboard, share } = await setup();
    const note = write(app, "Shopping");
    await app.copyNote(note.id);
    await app.shareNote(note.id);
    expect(clipboard).toHaveBeenCalledWith("Shopping\n\n⬜ Buy milk");
    expect(share).toHaveBeenCalledWith("Shopping\n\n⬜ Buy milk");
  });

  it("fails on unknown notes", async () => {
    const { app } = await setup();
    await expect(app.deleteNote(99)).rejects.toThrow("Note 99 does not exist");
  });
});

// ---------------------------------------------------------------------------
// performSwipeAction
// ---------------------------------------------------------------------------

describe("NotesApp.performSwipeAction", () => {
  it("dismisses the tile of deleted notes only", async () => {
    const { app, share, clipboard } = await setup();
    const note = write(app, "Swiped");

    expect(await app.performSwipeAction(note, "togglePin")).toBe(false);
    expect(await app.performSwipeAction(note, "share")).toBe(false);
    expect(await app.performSwipeAction(note, "copy")).toBe(false);
    expect(share).toHaveBeenCalledTimes(1);
    expect(clipboard).toHaveBeenCalledTimes(1);

    expect(await app.performSwipeAction(note, "delete")).toBe(true);
    expect(titles(app.listBin())).toEqual(["Swiped"]);
  });

  it("keeps the tile when the deletion is not confirmed", async () => {
    const { app, confirm } = await setup({ confirmations: "all" });
    const note = write(app, "Stay");
    confirm.mockResolvedValue(false);
    expect(await app.performSwipeAction(note, "delete")).toBe(false);
  });

  it("throws for a disabled action", async () => {
    const { app } = await setup();
    const note = write(app, "x");
    await expect(app.performSwipeAction(note, "disabled")).rejects.toThrow(
      "Unexpected swipe action when swiping on note tile: disabled",
    );
  });
});

// ---------------------------------------------------------------------------
// Backup
// ---------------------------------------------------------------------------

describe("NotesApp backup", () => {
  it("imports an exported backup as new notes", async () => {
    const source = (await setup()).app;
    write(source, "Saved");
    const json = await source.exportBackup();

    const { app } = await setup();
    write(app, "Existing");
    expect(await app.importBackup(json)).toBe(1);
    expect(titles(app.listNotes()).sort()).toEqual(["Existing", "Saved"]);
  });

  it("requires a password when backups are encrypted", async () => {
    const { app } = await setup({ encryptBackups: true });
    await expect(app.exportBackup()).rejects.toThrow(BackupError);
  });
});
