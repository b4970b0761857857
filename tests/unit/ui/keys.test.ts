import { describe, expect, it } from "vitest";

import { translateKey } from "../../../src/ui/keys.js";

describe("translateKey", () => {
  it("passes printable characters through", () => {
    expect(translateKey("G", { name: "g" })).toBe("G");
    expect(translateKey(" ", { name: "space" })).toBe(" ");
    expect(translateKey(":", undefined)).toBe(":");
  });

  it("names special keys", () => {
    expect(translateKey(undefined, { name: "up" })).toBe("up");
    expect(translateKey("\x1b", { name: "escape" })).toBe("escape");
    expect(translateKey("\x7f", { name: "backspace" })).toBe("backspace");
    expect(translateKey("\t", { name: "tab" })).toBe("tab");
  });

  it("reports Enter once", () => {
    expect(translateKey("\r", { name: "return" })).toBeNull();
    expect(translateKey("\r", { name: "enter" })).toBe("enter");
  });

  it("drops chords and unknown keys", () => {
    expect(translateKey("\x03", { name: "c", ctrl: true })).toBeNull();
    expect(translateKey(undefined, { name: "f1" })).toBeNull();
  });
});
