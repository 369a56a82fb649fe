/**
 * Device -- per-category facade that owns "the effect currently active on this
 * device" and expresses effect changes through the LightingBackend contract.
 *
 * @module Devices
 */

import type { Color } from "../core/color.js";
import type { DeviceCategory, EffectKind, TypedDeviceCategory } from "../core/device-category.js";
import { EffectId } from "../core/effect-id.js";
import type { EffectPayload, LightingBackend } from "../core/interfaces/lighting-backend.js";
import type { Logger } from "../interfaces/logger.js";
import { componentLogger, noopLogger } from "../utils/noop-logger.js";

/** Parameters of a `static` effect. */
export interface StaticEffect {
  color: Color;
}

export interface DeviceOptions {
  logger?: Logger;
}

/**
 * Base class for every device category.
 *
 * `currentEffect` follows completion order: concurrent `setEffect` calls on
 * one device are applied as their backend calls finish. Callers that need
 * strict ordering must serialize their own calls. Replaced effects are not
 * deleted; the backend swaps the active effect itself.
 */
export abstract class Device<K extends string = string> {
  abstract readonly category: DeviceCategory;

  protected readonly logger: Logger;
  private current: EffectId = EffectId.NONE;

  constructor(
    protected readonly backend: LightingBackend,
    options: DeviceOptions = {},
  ) {
    this.logger = componentLogger(options.logger ?? noopLogger, "device");
  }

  get currentEffect(): EffectId {
    return this.current;
  }

  /** Activate an effect the backend already created and record it as current. */
  async setEffectId(id: EffectId): Promise<EffectId> {
    await this.backend.setEffect(id);
    this.current = id;
    this.logger.debug?.("Effect applied", { category: this.category, effectId: id.toString() });
    return id;
  }

  /** Create an effect of `kind` (payload forwarded unchanged), activate it and record it. */
  async setEffect(kind: K, payload?: EffectPayload): Promise<EffectId> {
    const id = await this.createEffect(kind, payload);
    return this.setEffectId(id);
  }

  /**
   * Delete an effect on the backend. Deleting the current effect resets
   * `currentEffect` to `EffectId.NONE`.
   */
  async deleteEffect(id: EffectId): Promise<void> {
    await this.backend.deleteEffect(id);
    if (this.current.equals(id)) this.current = EffectId.NONE;
  }

  /** Switch the device to its category's "none" effect. */
  abstract clear(): Promise<EffectId>;

  /** Light the whole device in one color; meaning depends on the category. */
  abstract setAll(color: Color): Promise<EffectId>;

  protected abstract createEffect(kind: K, payload?: EffectPayload): Promise<EffectId>;
}

/** A device reached through its category endpoint. */
export abstract class CategoryDevice<C extends TypedDeviceCategory> extends Device<EffectKind<C>> {
  abstract override readonly category: C;

  protected createEffect(kind: EffectKind<C>, payload?: EffectPayload): Promise<EffectId> {
    return this.backend.createEffect(this.category, kind, payload);
  }
}
