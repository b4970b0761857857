import type { Widgets } from "blessed";
import blessed from "neo-blessed";

import type { Frame } from "../editor/editor.js";
import type { RowId } from "../editor/row.js";
import {
  EMPTY_LINE_MARKUP,
  escapeTags,
  hintLines,
  lineMarkup,
  statusMarkup,
} from "./format.js";

// what each text line currently shows: a row, the "~" filler, or nothing yet
type Slot = RowId | "empty" | null;

/**
 * Paints frames onto a blessed screen: title bar, text area, status bar,
 * command line, and the key-hint overlay. Text lines are rewritten only when
 * their row is dirty or a different row has scrolled into the slot.
 */
export class Renderer {
  private readonly titleBox: Widgets.BoxElement;
  private readonly textBox: Widgets.BoxElement;
  private readonly statusBox: Widgets.BoxElement;
  private readonly messageBox: Widgets.BoxElement;
  private readonly hintsBox: Widgets.BoxElement;
  private slots: Slot[] = [];

  constructor(private readonly screen: Widgets.Screen) {
    this.titleBox = blessed.box({
      top: 0,
      left: 0,
      width: "100%",
      height: 1,
      tags: true,
    });
    this.textBox = blessed.box({
      top: 1,
      left: 0,
      width: "100%",
      height: "100%-3",
      tags: true,
    });
    this.statusBox = blessed.box({
      bottom: 1,
      left: 0,
      width: "100%",
      height: 1,
      tags: true,
      style: { inverse: true },
    });
    this.messageBox = blessed.box({
      bottom: 0,
      left: 0,
      width: "100%",
      height: 1,
      tags: false,
    });
    // Key-sequence hints overlay
    this.hintsBox = blessed.box({
      top: 1,
      left: 2,
      width: "50%",
      height: 10,
      border: "line",
      hidden: true,
    });

    screen.append(this.titleBox);
    screen.append(this.textBox);
    screen.append(this.statusBox);
    screen.append(this.messageBox);
    screen.append(this.hintsBox);
  }

  get width(): number {
    return Number(this.screen.width);
  }

  get height(): number {
    return Number(this.screen.height);
  }

  /** Forgets what is on screen; the next frame repaints every line. */
  invalidate(): void {
    this.slots = [];
  }

  render(frame: Frame): void {
    this.titleBox.setContent(` rowedit: ${escapeTags(frame.title)}`);
    this.paintText(frame);
    this.statusBox.setContent(statusMarkup(frame.status, frame.pending));
    this.messageBox.setContent(frame.message);

    if (frame.hints.length > 0) {
      this.hintsBox.setContent(hintLines(frame.hints).join("\n"));
      this.hintsBox.show();
    } else {
      this.hintsBox.hide();
    }

    this.screen.render();
    this.screen.program.cup(frame.cursor.row, frame.cursor.col);
    this.screen.program.showCursor();
  }

  private paintText(frame: Frame): void {
    const height = frame.visibleHeight;
    if (this.slots.length !== height) {
      this.slots = new Array<Slot>(height).fill(null);
      this.textBox.setContent(new Array<string>(height).fill("").join("\n"));
    }

    for (let i = 0; i < height; i++) {
      const visible = frame.rows[i];
      if (visible === undefined) {
        if (this.slots[i] !== "empty") {
          this.textBox.setLine(i, EMPTY_LINE_MARKUP);
          this.slots[i] = "empty";
        }
        continue;
      }
      const { row } = visible;
      if (!row.dirty && this.slots[i] === row.id) continue;
      this.textBox.setLine(i, lineMarkup(visible, frame.firstVisibleCol, frame.textWidth));
      this.slots[i] = row.id;
      row.dirty = false;
    }
  }
}
