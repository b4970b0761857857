/**
 * Settings
 *
 * Editor configuration read from ~/.rowedit/settings.json (or --config).
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export type EditorSettings = {
  "editor.tabSize": number;
  "editor.keyHints": boolean;
  "debug.logFile": string;
};

export const defaultSettings: EditorSettings = {
  "editor.tabSize": 2,
  "editor.keyHints": true,
  "debug.logFile": "debug.log",
};

export type ParsedSettings = {
  settings: Partial<EditorSettings>;
  warnings: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Keeps the known, well-typed keys of a settings object. */
export function parseSettings(raw: unknown): ParsedSettings {
  const settings: Partial<EditorSettings> = {};
  const warnings: string[] = [];
  if (!isRecord(raw)) {
    return { settings, warnings: ["settings must be a JSON object"] };
  }

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "editor.tabSize":
        if (typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 16) {
          settings[key] = value;
        } else {
          warnings.push(`${key}: expected an integer between 1 and 16`);
        }
        break;
      case "editor.keyHints":
        if (typeof value === "boolean") settings[key] = value;
        else warnings.push(`${key}: expected a boolean`);
        break;
      case "debug.logFile":
        if (typeof value === "string" && value.length > 0) settings[key] = value;
        else warnings.push(`${key}: expected a file path`);
        break;
      default:
        warnings.push(`unknown setting: ${key}`);
    }
  }
  return { settings, warnings };
}

export class Settings {
  private readonly settings: EditorSettings;

  constructor(initial: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings, ...initial };
  }

  get<K extends keyof EditorSettings>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

}

export function defaultSettingsPath(): string {
  return path.join(os.homedir(), ".rowedit", "settings.json");
}

/**
 * Reads a settings file. A missing file gives the defaults; unreadable or
 * malformed content gives the defaults plus a warning.
 */
export function loadSettings(file: string): { settings: Settings; warnings: string[] } {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { settings: new Settings(), warnings: [] };
    }
    return {
      settings: new Settings(),
      warnings: [`cannot read ${file}: ${error instanceof Error ? error.message : "Unknown error"}`],
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return {
      settings: new Settings(),
      warnings: [`invalid JSON in ${file}: ${error instanceof Error ? error.message : "Unknown error"}`],
    };
  }

  const parsed = parseSettings(raw);
  return { settings: new Settings(parsed.settings), warnings: parsed.warnings };
}
