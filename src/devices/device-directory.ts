import type { TypedDeviceCategory } from "../core/device-category.js";
import type { LightingBackend } from "../core/interfaces/lighting-backend.js";
import { UnsupportedDeviceError, UnsupportedOperationError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { componentLogger, noopLogger } from "../utils/noop-logger.js";
import type { Device, DeviceOptions } from "./device.js";
import { GenericDevice } from "./generic-device.js";
import { Headset } from "./headset.js";
import { Keyboard } from "./keyboard.js";
import { Keypad } from "./keypad.js";
import { LinkDevice } from "./link-device.js";
import { Mouse } from "./mouse.js";
import { Mousepad } from "./mousepad.js";

export interface CategoryDevices {
  keyboard: Keyboard;
  mouse: Mouse;
  mousepad: Mousepad;
  headset: Headset;
  keypad: Keypad;
  link: LinkDevice;
}

type DeviceFactories = {
  [C in TypedDeviceCategory]: (backend: LightingBackend, options: DeviceOptions) => CategoryDevices[C];
};

const FACTORIES: DeviceFactories = {
  keyboard: (backend, options) => new Keyboard(backend, options),
  mouse: (backend, options) => new Mouse(backend, options),
  mousepad: (backend, options) => new Mousepad(backend, options),
  headset: (backend, options) => new Headset(backend, options),
  keypad: (backend, options) => new Keypad(backend, options),
  link: (backend, options) => new LinkDevice(backend, options),
};

export interface DeviceDirectoryOptions {
  /** Generic device ids that may be opened. Matching ignores case. */
  genericDeviceAllowList?: readonly string[];
  logger?: Logger;
}

/**
 * Hands out one Device per category (and per generic device id), all built
 * against the same backend.
 */
export class DeviceDirectory {
  private readonly allowList: ReadonlySet<string>;
  private readonly logger: Logger;
  private readonly deviceOptions: DeviceOptions;
  private readonly opened: { [C in TypedDeviceCategory]?: CategoryDevices[C] } = {};
  private readonly generic = new Map<string, GenericDevice>();

  constructor(
    private readonly backend: LightingBackend,
    options: DeviceDirectoryOptions = {},
  ) {
    this.allowList = new Set((options.genericDeviceAllowList ?? []).map(normalizeId));
    this.logger = componentLogger(options.logger ?? noopLogger, "device-directory");
    this.deviceOptions = { logger: options.logger };
  }

  /** The device for `category`, created on first use. */
  open<C extends TypedDeviceCategory>(category: C): CategoryDevices[C] {
    const existing = this.opened[category];
    if (existing) return existing;

    const device = FACTORIES[category](this.backend, this.deviceOptions);
    this.opened[category] = device;
    this.logger.info("Device opened", { category });
    return device;
  }

  /**
   * The generic device with `deviceId`. Fails with `UnsupportedDeviceError`
   * for ids outside the allow-list, and with `UnsupportedOperationError` when
   * the backend cannot address generic devices.
   */
  openGeneric(deviceId: string): GenericDevice {
    const id = normalizeId(deviceId);
    const existing = this.generic.get(id);
    if (existing) return existing;

    if (!this.allowList.has(id)) {
      this.logger.warn("Rejected unknown generic device", { deviceId });
      throw new UnsupportedDeviceError(deviceId);
    }
    if (!this.backend.capabilities.genericDevices) {
      throw new UnsupportedOperationError(
        "openGeneric",
        `The ${this.backend.kind} backend does not support generic devices`,
      );
    }

    const device = new GenericDevice(id, this.backend, this.deviceOptions);
    this.generic.set(id, device);
    this.logger.info("Generic device opened", { deviceId: id });
    return device;
  }

  isAllowed(deviceId: string): boolean {
    return this.allowList.has(normalizeId(deviceId));
  }

  /** Every open device: categories first, then generic devices in opening order. */
  devices(): Device[] {
    const devices: Device[] = [];
    for (const device of Object.values(this.opened)) {
      if (device) devices.push(device);
    }
    return [...devices, ...this.generic.values()];
  }

  /**
   * Forget `device`, clearing it first when the backend is still active. The
   * clear is best-effort: a failure is logged, not thrown.
   */
  async close(device: Device): Promise<void> {
    if (this.backend.state === "active") {
      try {
        await device.clear();
      } catch (err) {
        this.logger.warn("Failed to clear device on close", {
          category: device.category,
          error: err,
        });
      }
    }

    if (device instanceof GenericDevice) {
      this.generic.delete(device.deviceId);
    } else {
      for (const category of Object.keys(FACTORIES)) {
        if (isTypedCategoryKey(category) && this.opened[category] === device) {
          delete this.opened[category];
        }
      }
    }
  }

  async closeAll(): Promise<void> {
    await Promise.all(this.devices().map((device) => this.close(device)));
  }
}

function normalizeId(deviceId: string): string {
  return deviceId.trim().toLowerCase();
}

function isTypedCategoryKey(key: string): key is TypedDeviceCategory {
  return key in FACTORIES;
}
