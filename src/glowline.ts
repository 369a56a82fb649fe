/**
 * Glowline -- application entry point.
 *
 * Resolves configuration, picks and initializes a backend, and hands out the
 * device facades. One instance owns one backend session.
 */

import { RestBackend, type RestBackendEvents, type SessionHealth } from "./adapters/rest/rest-backend.js";
import { createBackend } from "./core/backend-factory.js";
import type { Color } from "./core/color.js";
import type { EffectId } from "./core/effect-id.js";
import type { LightingBackend, NotificationHandle } from "./core/interfaces/lighting-backend.js";
import { TypedEventEmitter } from "./core/typed-emitter.js";
import type { Device } from "./devices/device.js";
import { DeviceDirectory } from "./devices/device-directory.js";
import type { GenericDevice } from "./devices/generic-device.js";
import type { Headset } from "./devices/headset.js";
import type { Keyboard } from "./devices/keyboard.js";
import type { Keypad } from "./devices/keypad.js";
import type { LinkDevice } from "./devices/link-device.js";
import type { Mouse } from "./devices/mouse.js";
import type { Mousepad } from "./devices/mousepad.js";
import type { Logger } from "./interfaces/logger.js";
import type { NativeSdk, SdkProbe } from "./interfaces/native-sdk.js";
import type { AppInfo, DeviceInfo } from "./types/app-info.js";
import { type GlowlineConfig, type ResolvedConfig, resolveConfig } from "./types/config.js";
import { componentLogger, noopLogger } from "./utils/noop-logger.js";

export interface GlowlineOptions {
  appInfo: AppInfo;
  config?: GlowlineConfig;
  nativeSdk?: NativeSdk;
  probe?: SdkProbe;
  logger?: Logger;
  /** Use this backend instead of building one from the config. */
  backend?: LightingBackend;
}

/** Heartbeat events of the control-plane backend, re-emitted unchanged. */
export type GlowlineEvents = RestBackendEvents;

const FORWARDED_EVENTS = [
  "heartbeat",
  "heartbeat_failed",
  "session_recovered",
  "session_lost",
] as const satisfies readonly (keyof RestBackendEvents)[];

export class Glowline extends TypedEventEmitter<GlowlineEvents> {
  readonly config: ResolvedConfig;
  readonly directory: DeviceDirectory;

  private readonly logger: Logger;
  private shutdown: Promise<void> | null = null;

  private constructor(
    readonly backend: LightingBackend,
    private readonly appInfo: AppInfo,
    config: ResolvedConfig,
    logger: Logger,
  ) {
    super();
    this.config = config;
    this.logger = componentLogger(logger, "glowline");
    this.directory = new DeviceDirectory(backend, {
      genericDeviceAllowList: config.genericDeviceAllowList,
      logger,
    });
    if (backend instanceof RestBackend) this.forwardEvents(backend);
  }

  /**
   * Build and initialize a backend. If initialization fails the backend is
   * disposed and the error rethrown.
   */
  static async create(options: GlowlineOptions): Promise<Glowline> {
    const config = resolveConfig(options.config);
    const logger = options.logger ?? noopLogger;
    const backend =
      options.backend ??
      createBackend(config, { nativeSdk: options.nativeSdk, probe: options.probe, logger });

    const glowline = new Glowline(backend, options.appInfo, config, logger);
    try {
      await backend.initialize(options.appInfo);
    } catch (err) {
      await backend.dispose();
      throw err;
    }
    glowline.logger.info("Lighting ready", { backend: backend.kind });
    return glowline;
  }

  get keyboard(): Keyboard {
    return this.directory.open("keyboard");
  }

  get mouse(): Mouse {
    return this.directory.open("mouse");
  }

  get mousepad(): Mousepad {
    return this.directory.open("mousepad");
  }

  get headset(): Headset {
    return this.directory.open("headset");
  }

  get keypad(): Keypad {
    return this.directory.open("keypad");
  }

  get link(): LinkDevice {
    return this.directory.open("link");
  }

  genericDevice(deviceId: string): GenericDevice {
    return this.directory.openGeneric(deviceId);
  }

  /** Health of the control-plane session; null on the native backend. */
  get health(): SessionHealth | null {
    return this.backend instanceof RestBackend ? this.backend.health : null;
  }

  /** Light every declared device category in one color. */
  setAll(color: Color): Promise<EffectId[]> {
    return this.fanOut("setAll", (device) => device.setAll(color));
  }

  /** Switch every declared device category to its "none" effect. */
  clear(): Promise<EffectId[]> {
    return this.fanOut("clear", (device) => device.clear());
  }

  queryDevice(deviceId: string): Promise<DeviceInfo> {
    return this.backend.queryDevice(deviceId);
  }

  registerEventNotifications(handle: NotificationHandle): void {
    this.backend.registerEventNotifications(handle);
  }

  unregisterEventNotifications(): void {
    this.backend.unregisterEventNotifications();
  }

  /**
   * Clear and close every open device (failures are logged), then end the
   * backend session. The first caller owns the outcome; later calls only wait
   * for it and never reject.
   */
  uninitialize(): Promise<void> {
    if (this.shutdown) return this.shutdown.then(noop, noop);
    this.shutdown = (async () => {
      await this.directory.closeAll();
      await this.backend.uninitialize();
      this.logger.info("Lighting shut down");
    })();
    return this.shutdown;
  }

  protected override onListenerError(event: keyof GlowlineEvents, error: unknown): void {
    this.logger.error("Event listener threw", { event, error });
  }

  private async fanOut(
    operation: string,
    apply: (device: Device) => Promise<EffectId>,
  ): Promise<EffectId[]> {
    const categories = [...new Set(this.appInfo.supportedDevices)];
    const devices: Device[] = categories.map((category) => this.directory.open(category));
    const results = await Promise.allSettled(devices.map(apply));

    const ids: EffectId[] = [];
    const errors: unknown[] = [];
    for (const result of results) {
      if (result.status === "fulfilled") ids.push(result.value);
      else errors.push(result.reason);
    }
    if (errors.length > 0) {
      this.logger.error(`${operation} failed on ${errors.length} device(s)`, {
        error: errors[0],
      });
      throw new AggregateError(errors, `${operation} failed on ${errors.length} device(s)`);
    }
    return ids;
  }

  private forwardEvents(backend: RestBackend): void {
    for (const event of FORWARDED_EVENTS) this.forward(backend, event);
  }

  private forward<K extends keyof RestBackendEvents & string>(backend: RestBackend, event: K): void {
    backend.on(event, (payload) => {
      this.emit(event, payload);
    });
  }
}

function noop(): void {}
