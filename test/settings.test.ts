import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_PREFERENCES, loadPreferences, parsePreferences, savePreferences } from "../src/settings";

// ---------------------------------------------------------------------------
// parsePreferences
// ---------------------------------------------------------------------------

describe("parsePreferences", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fills missing keys with defaults without warning", () => {
    expect(parsePreferences({ sortMethod: "title", enableLabels: false })).toEqual({
      ...DEFAULT_PREFERENCES,
      sortMethod: "title",
      enableLabels: false,
    });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("resets malformed keys with a warning", () => {
    const prefs = parsePreferences({ sortMethod: "size", sortAscending: "yes", layout: "grid" });
    expect(prefs.sortMethod).toBe("editedDate");
    expect(prefs.sortAscending).toBe(false);
    expect(prefs.layout).toBe("grid");
    expect(console.warn).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith('[preferences] resetting malformed "sortMethod" to its default', "size");
  });

  it("drops unknown keys", () => {
    expect(parsePreferences({ theme: "dark" })).toEqual(DEFAULT_PREFERENCES);
  });

  it("uses defaults for values that are not objects", () => {
    expect(parsePreferences(undefined)).toEqual(DEFAULT_PREFERENCES);
    expect(console.warn).not.toHaveBeenCalled();
    expect(parsePreferences([1, 2])).toEqual(DEFAULT_PREFERENCES);
    expect(console.warn).toHaveBeenCalledWith("[preferences] stored preferences are not an object, using defaults");
  });
});

// ---------------------------------------------------------------------------
// loadPreferences / savePreferences
// ---------------------------------------------------------------------------

describe("loadPreferences / savePreferences", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "notes-prefs-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", async () => {
    expect(await loadPreferences(join(dir, "missing.json"))).toEqual(DEFAULT_PREFERENCES);
  });

  it("returns a copy of the defaults", async () => {
    const prefs = await loadPreferences(join(dir, "missing.json"));
    expect(prefs).not.toBe(DEFAULT_PREFERENCES);
  });

  it("saves into nested folders and loads back", async () => {
    const path = join(dir, "nested", "prefs.json");
    const prefs = { ...DEFAULT_PREFERENCES, layout: "grid" as const, confirmations: "all" as const };
    await savePreferences(path, prefs);

    expect(await loadPreferences(path)).toEqual(prefs);
    const text = await readFile(path, "utf8");
    expect(text.startsWith('{\n  "sortMethod": "editedDate",')).toBe(true);
    expect(text.endsWith("}\n")).toBe(true);
  });

  it("returns defaults for a file that is not JSON", async () => {
    const path = join(dir, "prefs.json");
    await writeFile(path, "{ not json", "utf8");
    expect(await loadPreferences(path)).toEqual(DEFAULT_PREFERENCES);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("rethrows other read errors", async () => {
    await expect(loadPreferences(dir)).rejects.toThrow();
  });
});
