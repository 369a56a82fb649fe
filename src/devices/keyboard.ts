import type { Color } from "../core/color.js";
import type { EffectId } from "../core/effect-id.js";
import { CategoryDevice, type StaticEffect } from "./device.js";

export const KEYBOARD_ROWS = 6;
export const KEYBOARD_COLUMNS = 22;

export class Keyboard extends CategoryDevice<"keyboard"> {
  readonly category = "keyboard" as const;

  setStatic(color: Color): Promise<EffectId> {
    return this.setEffect("static", { color } satisfies StaticEffect);
  }

  /** Per-key colors as a `KEYBOARD_ROWS` × `KEYBOARD_COLUMNS` grid. */
  async setCustom(grid: readonly (readonly Color[])[]): Promise<EffectId> {
    if (grid.length !== KEYBOARD_ROWS || grid.some((row) => row.length !== KEYBOARD_COLUMNS)) {
      throw new RangeError(`Keyboard grid must be ${KEYBOARD_ROWS}x${KEYBOARD_COLUMNS}`);
    }
    return this.setEffect("custom", grid);
  }

  setAll(color: Color): Promise<EffectId> {
    return this.setStatic(color);
  }

  clear(): Promise<EffectId> {
    return this.setEffect("none");
  }
}
