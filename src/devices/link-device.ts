import { BLACK, type Color } from "../core/color.js";
import type { EffectId } from "../core/effect-id.js";
import { CategoryDevice, type StaticEffect } from "./device.js";

export const LINK_DEVICE_POSITIONS = 5;

/**
 * Link device with individually addressable positions.
 *
 * The positions live in a local custom-effect buffer. The backend has no
 * partial update, so each `set` re-submits the whole buffer as a new
 * `custom` effect.
 */
export class LinkDevice extends CategoryDevice<"link"> {
  readonly category = "link" as const;

  private readonly buffer: Color[] = new Array<Color>(LINK_DEVICE_POSITIONS).fill(BLACK);

  get size(): number {
    return LINK_DEVICE_POSITIONS;
  }

  get(index: number): Color {
    return this.buffer[this.checkIndex(index)];
  }

  /** Positions currently set to a non-black color. */
  isSet(index: number): boolean {
    return this.get(index) !== BLACK;
  }

  /** Copy of the local buffer. */
  colors(): Color[] {
    return [...this.buffer];
  }

  async set(index: number, color: Color): Promise<EffectId> {
    this.buffer[this.checkIndex(index)] = color;
    return this.submitBuffer();
  }

  /** Replace the whole buffer and submit it. */
  async setCustom(colors: readonly Color[]): Promise<EffectId> {
    if (colors.length !== LINK_DEVICE_POSITIONS) {
      throw new RangeError(`Link device takes exactly ${LINK_DEVICE_POSITIONS} colors`);
    }
    this.buffer.splice(0, LINK_DEVICE_POSITIONS, ...colors);
    return this.submitBuffer();
  }

  setStatic(color: Color): Promise<EffectId> {
    return this.setEffect("static", { color } satisfies StaticEffect);
  }

  /** Fills the local buffer so reads match, and applies a `static` effect. */
  async setAll(color: Color): Promise<EffectId> {
    this.buffer.fill(color);
    return this.setStatic(color);
  }

  clear(): Promise<EffectId> {
    return this.setEffect("none");
  }

  private submitBuffer(): Promise<EffectId> {
    return this.setEffect("custom", [...this.buffer]);
  }

  private checkIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= LINK_DEVICE_POSITIONS) {
      throw new RangeError(`Link device position ${index} out of range [0, ${LINK_DEVICE_POSITIONS})`);
    }
    return index;
  }
}
