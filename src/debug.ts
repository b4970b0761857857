import fs from "node:fs";

let enabled = false;
let logFile = "debug.log";

export function setDebugEnabled(on: boolean, file?: string): void {
  enabled = on;
  if (file) logFile = file;
}

export function isDebugEnabled(): boolean {
  return enabled;
}

/**
 * Appends a timestamped line to the debug log. The terminal belongs to the
 * editor while it runs, so this is the only place diagnostics go.
 */
export function debugLog(message: string): void {
  if (!enabled) return;
  try {
    fs.appendFileSync(logFile, `[${new Date().toISOString()}] ${message}\n`, "utf8");
  } catch (error) {
    // stop logging rather than fail every keystroke
    enabled = false;
    process.emitWarning(
      `debug log disabled: ${error instanceof Error ? error.message : "Unknown error"}`,
    );
  }
}
