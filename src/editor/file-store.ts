import fs from "node:fs";

/** Load/save collaborator. Lines handed to the core keep their terminators. */
export type FileStore = {
  loadLines(path: string): string[];
  writeLines(path: string, rows: Iterable<string>): void;
};

/** Splits file content into lines, each keeping its "\n" (or "\r\n"). */
export function splitLines(data: string): string[] {
  return data.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export class NodeFileStore implements FileStore {
  loadLines(path: string): string[] {
    return splitLines(fs.readFileSync(path, "utf8"));
  }

  writeLines(path: string, rows: Iterable<string>): void {
    let data = "";
    for (const row of rows) data += row + "\n";
    fs.writeFileSync(path, data, "utf8");
  }
}
