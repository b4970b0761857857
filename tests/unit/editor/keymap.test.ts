import { describe, expect, it } from "vitest";

import { getHints, normalMap, resolveSequence, stepKey } from "../../../src/editor/keymap.js";

describe("keymap", () => {
  it("steps into groups and commands", () => {
    const deleteGroup = stepKey(normalMap, "d");
    expect(deleteGroup?.kind).toBe("group");
    expect(resolveSequence(normalMap, ["d", "w"])).toEqual({
      kind: "cmd",
      title: "Delete to next word",
      actionId: "edit.deleteWord",
      repeatable: true,
    });
  });

  it("returns null off the map", () => {
    expect(stepKey(normalMap, "toString")).toBeNull();
    expect(resolveSequence(normalMap, ["g", "x"])).toBeNull();
    expect(resolveSequence(normalMap, ["x", "x"])).toBeNull();
  });

  it("lists the children of a group", () => {
    const goto = resolveSequence(normalMap, ["g"]);
    expect(goto && getHints(goto)).toEqual([{ key: "g", title: "First line", kind: "cmd" }]);
  });
});
