import type { Color } from "../core/color.js";
import type { EffectId } from "../core/effect-id.js";
import { CategoryDevice, type StaticEffect } from "./device.js";

export class Headset extends CategoryDevice<"headset"> {
  readonly category = "headset" as const;

  setStatic(color: Color): Promise<EffectId> {
    return this.setEffect("static", { color } satisfies StaticEffect);
  }

  setAll(color: Color): Promise<EffectId> {
    return this.setStatic(color);
  }

  clear(): Promise<EffectId> {
    return this.setEffect("none");
  }
}
