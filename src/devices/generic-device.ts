import type { Color } from "../core/color.js";
import type { EffectKind } from "../core/device-category.js";
import type { EffectId } from "../core/effect-id.js";
import type { EffectPayload, LightingBackend } from "../core/interfaces/lighting-backend.js";
import { UnsupportedOperationError } from "../errors.js";
import { Device, type DeviceOptions } from "./device.js";

/**
 * A device known only by id. Effects go through `createDeviceEffect`, and
 * there is no "all positions" without a known layout.
 *
 * Construct through `DeviceDirectory.openGeneric`, which checks the id.
 */
export class GenericDevice extends Device<EffectKind<"generic">> {
  readonly category = "generic" as const;

  constructor(
    readonly deviceId: string,
    backend: LightingBackend,
    options?: DeviceOptions,
  ) {
    super(backend, options);
  }

  async setAll(_color: Color): Promise<EffectId> {
    throw new UnsupportedOperationError(
      "setAll",
      "Setting colors is not supported on generic devices",
    );
  }

  clear(): Promise<EffectId> {
    return this.setEffect("none");
  }

  protected createEffect(kind: EffectKind<"generic">, payload?: EffectPayload): Promise<EffectId> {
    return this.backend.createDeviceEffect(this.deviceId, kind, payload);
  }
}
