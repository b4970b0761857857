export type NormalActionId =
  | "cursor.left"
  | "cursor.right"
  | "cursor.down"
  | "cursor.up"
  | "cursor.lineHome"
  | "cursor.firstNonblank"
  | "cursor.lineEnd"
  | "cursor.wordNext"
  | "cursor.wordPrev"
  | "cursor.top"
  | "cursor.bottom"
  | "edit.deleteChar"
  | "edit.deleteLine"
  | "edit.deleteWord"
  | "mode.insert"
  | "mode.append"
  | "message.clear";

export type KeyNode =
  | { kind: "group"; title: string; children: Record<string, KeyNode> }
  | { kind: "cmd"; title: string; actionId: NormalActionId; repeatable: boolean };

export function group(
  title: string,
  children: Record<string, KeyNode>,
): KeyNode {
  return { kind: "group", title, children };
}
export function cmd(
  title: string,
  actionId: NormalActionId,
  repeatable = true,
): KeyNode {
  return { kind: "cmd", title, actionId, repeatable };
}

// Normal mode: single keys act immediately, groups arm a key sequence.
export const normalMap: KeyNode = group("normal", {
  h: cmd("Left", "cursor.left"),
  left: cmd("Left", "cursor.left"),
  l: cmd("Right", "cursor.right"),
  right: cmd("Right", "cursor.right"),
  j: cmd("Down", "cursor.down"),
  down: cmd("Down", "cursor.down"),
  k: cmd("Up", "cursor.up"),
  up: cmd("Up", "cursor.up"),
  "0": cmd("Start of line", "cursor.lineHome"),
  "^": cmd("First non-blank", "cursor.firstNonblank"),
  $: cmd("End of line", "cursor.lineEnd"),
  w: cmd("Next word", "cursor.wordNext"),
  b: cmd("Previous word", "cursor.wordPrev"),
  G: cmd("Last line", "cursor.bottom"),
  x: cmd("Delete character", "edit.deleteChar"),
  i: cmd("Insert", "mode.insert", false),
  a: cmd("Append", "mode.append", false),
  escape: cmd("Clear message", "message.clear", false),
  g: group("goto", {
    g: cmd("First line", "cursor.top"),
  }),
  d: group("delete", {
    d: cmd("Delete line", "edit.deleteLine"),
    w: cmd("Delete to next word", "edit.deleteWord"),
  }),
});

export function getHints(
  node: KeyNode,
): Array<{ key: string; title: string; kind: "group" | "cmd" }> {
  if (node.kind !== "group") return [];
  return Object.entries(node.children).map(([key, child]) => ({
    key,
    title: child.title,
    kind: child.kind,
  }));
}

export function stepKey(node: KeyNode, key: string): KeyNode | null {
  if (node.kind !== "group") return null;
  return Object.hasOwn(node.children, key) ? (node.children[key] ?? null) : null;
}

/** Follows `keys` from the root; null when the path leaves the map. */
export function resolveSequence(root: KeyNode, keys: readonly string[]): KeyNode | null {
  let node: KeyNode | null = root;
  for (const key of keys) {
    if (node === null) return null;
    node = stepKey(node, key);
  }
  return node;
}
