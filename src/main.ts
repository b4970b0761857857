#!/usr/bin/env node
import chalk from "chalk";
import commandLineArgs from "command-line-args";
import commandLineUsage from "command-line-usage";
import blessed from "neo-blessed";
import path from "node:path";

import { defaultSettingsPath, loadSettings } from "./config/settings.js";
import { debugLog, setDebugEnabled } from "./debug.js";
import { Editor } from "./editor/editor.js";
import { NodeFileStore } from "./editor/file-store.js";
import { translateKey } from "./ui/keys.js";
import { Renderer } from "./ui/renderer.js";

const optionDefinitions = [
  {
    name: "file",
    type: String,
    defaultOption: true,
    typeLabel: "{underline file}",
    description: "File to open; created on the first save if it does not exist",
  },
  {
    name: "config",
    alias: "c",
    type: String,
    typeLabel: "{underline file}",
    description: "Settings file (default: ~/.rowedit/settings.json)",
  },
  {
    name: "debug",
    alias: "d",
    type: Boolean,
    description: "Append a trace of key handling to the debug log",
  },
  {
    name: "help",
    alias: "h",
    type: Boolean,
    description: "Print this usage guide",
  },
];

const usage = commandLineUsage([
  {
    header: "rowedit",
    content: "A modal terminal editor with incremental syntax highlighting.",
  },
  {
    header: "Synopsis",
    content: "$ rowedit [{bold --debug}] [{bold --config} {underline file}] [{underline file}]",
  },
  {
    header: "Options",
    optionList: optionDefinitions,
  },
]);

type CliOptions = {
  file: string | null;
  config: string | null;
  debug: boolean;
  help: boolean;
};

function fail(message: string): never {
  console.error(chalk.red(message));
  console.error(usage);
  process.exit(1);
}

function parseArgs(argv: string[]): CliOptions {
  let parsed: commandLineArgs.CommandLineOptions;
  try {
    parsed = commandLineArgs(optionDefinitions, { argv });
  } catch (error) {
    fail(error instanceof Error ? error.message : "Unknown error");
  }
  const file: unknown = parsed.file;
  const config: unknown = parsed.config;
  if (parsed.config !== undefined && typeof config !== "string") {
    fail("--config needs a file path");
  }
  return {
    file: typeof file === "string" ? file : null,
    config: typeof config === "string" ? config : null,
    debug: parsed.debug === true,
    help: parsed.help === true,
  };
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(usage);
    return;
  }

  const { settings, warnings } = loadSettings(options.config ?? defaultSettingsPath());
  if (options.debug) setDebugEnabled(true, settings.get("debug.logFile"));
  for (const warning of warnings) debugLog(`[Settings] ${warning}`);

  const screen = blessed.screen({
    smartCSR: true,
    title: "rowedit",
    fullUnicode: true,
  });
  const renderer = new Renderer(screen);
  const filePath = options.file ? path.resolve(options.file) : null;
  const editor = Editor.open(filePath, new NodeFileStore(), settings, {
    width: renderer.width,
    height: renderer.height,
  });
  if (warnings.length > 0) editor.statusMessage = `Settings: ${warnings[0]}`;
  debugLog(`[Main] started with ${filePath ?? "no file"}`);

  const quit = (): void => {
    screen.destroy();
    process.exit(0);
  };

  screen.key(["C-c"], quit);

  screen.on("keypress", (ch: string | undefined, key: { name?: string; ctrl?: boolean; meta?: boolean }) => {
    const k = translateKey(ch, key);
    if (k === null) return;
    editor.handleKey(k);
    if (editor.exiting) return quit();
    renderer.render(editor.frame());
  });

  screen.on("resize", () => {
    editor.resize(renderer.width, renderer.height);
    renderer.invalidate();
    renderer.render(editor.frame());
  });

  renderer.render(editor.frame());
}

main();
