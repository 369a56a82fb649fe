import type { Color } from "../core/color.js";
import type { EffectId } from "../core/effect-id.js";
import { CategoryDevice, type StaticEffect } from "./device.js";

export class Mouse extends CategoryDevice<"mouse"> {
  readonly category = "mouse" as const;

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
