import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  defaultSettings,
  loadSettings,
  parseSettings,
  Settings,
} from "../../../src/config/settings.js";

describe("parseSettings", () => {
  it("keeps valid keys", () => {
    expect(parseSettings({ "editor.tabSize": 4, "editor.keyHints": false })).toEqual({
      settings: { "editor.tabSize": 4, "editor.keyHints": false },
      warnings: [],
    });
  });

  it("warns about bad values and unknown keys", () => {
    const { settings, warnings } = parseSettings({
      "editor.tabSize": 0,
      "debug.logFile": "",
      "editor.theme": "dark",
    });
    expect(settings).toEqual({});
    expect(warnings).toEqual([
      "editor.tabSize: expected an integer between 1 and 16",
      "debug.logFile: expected a file path",
      "unknown setting: editor.theme",
    ]);
  });

  it("rejects anything but an object", () => {
    expect(parseSettings([1, 2]).warnings).toEqual(["settings must be a JSON object"]);
  });
});

describe("Settings", () => {
  it("falls back to defaults", () => {
    const settings = new Settings({ "editor.tabSize": 8 });
    expect(settings.get("editor.tabSize")).toBe(8);
    expect(settings.get("editor.keyHints")).toBe(true);
  });

  it("keeps every value it was given", () => {
    const settings = new Settings({ "editor.keyHints": false, "debug.logFile": "trace.log" });
    expect(settings.get("editor.keyHints")).toBe(false);
    expect(settings.get("debug.logFile")).toBe("trace.log");
    expect(settings.get("editor.tabSize")).toBe(defaultSettings["editor.tabSize"]);
  });
});

describe("loadSettings", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "rowedit-settings-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("uses the defaults when the file does not exist", () => {
    const { settings, warnings } = loadSettings(path.join(dir, "missing.json"));
    expect(settings.get("editor.tabSize")).toBe(2);
    expect(settings.get("editor.keyHints")).toBe(true);
    expect(warnings).toEqual([]);
  });

  it("reads a settings file", () => {
    const file = path.join(dir, "settings.json");
    fs.writeFileSync(file, JSON.stringify({ "editor.tabSize": 4 }), "utf8");
    const { settings, warnings } = loadSettings(file);
    expect(settings.get("editor.tabSize")).toBe(4);
    expect(warnings).toEqual([]);
  });

  it("warns about malformed JSON", () => {
    const file = path.join(dir, "settings.json");
    fs.writeFileSync(file, "{ nope", "utf8");
    const { settings, warnings } = loadSettings(file);
    expect(settings.get("editor.tabSize")).toBe(2);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.startsWith(`invalid JSON in ${file}:`)).toBe(true);
  });
});
