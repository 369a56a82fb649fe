/**
 * NativeBackend -- LightingBackend over an in-process SDK binding.
 *
 * The binding answers synchronously with result codes; this class maps them
 * onto the shared error taxonomy and the backend lifecycle.
 */

import { BackendLifecycle, type BackendLifecycleState } from "../../core/backend-lifecycle.js";
import {
  type DeviceCategory,
  type EffectKind,
  effectWireName,
  isEffectKind,
} from "../../core/device-category.js";
import { EffectId } from "../../core/effect-id.js";
import {
  type BackendCapabilities,
  type EffectPayload,
  isTypedCategory,
  type LightingBackend,
  type NotificationHandle,
} from "../../core/interfaces/lighting-backend.js";
import { describeResultCode, isSuccess, RESULT_CODES, type ResultCode } from "../../core/result-code.js";
import {
  ApiResultError,
  BackendCallError,
  BackendInitError,
  EffectCreateError,
  UnsupportedOperationError,
} from "../../errors.js";
import type { Logger } from "../../interfaces/logger.js";
import type { NativeCreateResult, NativeSdk } from "../../interfaces/native-sdk.js";
import { appInfoSchema } from "../../types/app-info-schema.js";
import type { AppInfo, DeviceInfo } from "../../types/app-info.js";
import { componentLogger, noopLogger } from "../../utils/noop-logger.js";

export interface NativeBackendOptions {
  sdk: NativeSdk;
  logger?: Logger;
}

export class NativeBackend implements LightingBackend {
  readonly kind = "native" as const;

  readonly capabilities: BackendCapabilities = {
    queryDevice: true,
    eventNotifications: true,
    genericDevices: true,
  };

  private readonly sdk: NativeSdk;
  private readonly logger: Logger;
  private readonly lifecycle = new BackendLifecycle();
  private eventsRegistered = false;

  constructor(options: NativeBackendOptions) {
    this.sdk = options.sdk;
    this.logger = componentLogger(options.logger ?? noopLogger, "native-backend");
  }

  get state(): BackendLifecycleState {
    return this.lifecycle.state;
  }

  async initialize(appInfo: AppInfo): Promise<void> {
    this.lifecycle.transition("initializing", "initialize");

    const info = appInfoSchema.safeParse(appInfo);
    if (!info.success) {
      this.lifecycle.transition("uninitialized", "initialize");
      throw new BackendInitError(`Invalid application info: ${info.error.message}`, {
        endpoint: "init",
      });
    }

    let result: ResultCode;
    try {
      result = this.sdk.init(info.data);
    } catch (err) {
      this.lifecycle.transition("uninitialized", "initialize");
      throw new BackendInitError("Native SDK init threw", { endpoint: "init" }, { cause: err });
    }

    if (!isSuccess(result)) {
      this.lifecycle.transition("uninitialized", "initialize");
      const error = new BackendInitError(
        `Native SDK init failed: ${describeResultCode(result)}`,
        { endpoint: "init", resultCode: result },
      );
      this.logger.error("Native SDK initialization failed", { error });
      throw error;
    }

    this.lifecycle.transition("active", "initialize");
    this.logger.info("Native SDK initialized");
  }

  async uninitialize(): Promise<void> {
    if (this.lifecycle.isDisposed) return;
    if (!this.lifecycle.isActive) {
      this.release();
      return;
    }

    try {
      this.expectSuccess("uninit", this.invoke("uninit", () => this.sdk.uninit()));
      this.logger.info("Native SDK uninitialized");
    } finally {
      this.release();
    }
  }

  async dispose(): Promise<void> {
    this.release();
  }

  async createEffect<C extends DeviceCategory>(
    category: C,
    kind: EffectKind<C>,
    payload?: EffectPayload,
  ): Promise<EffectId> {
    if (!isTypedCategory(category)) {
      throw new UnsupportedOperationError(
        "createEffect",
        "Generic devices are addressed by id; use createDeviceEffect",
      );
    }
    if (!isEffectKind(category, kind)) {
      throw new TypeError(`Unknown ${category} effect kind: ${String(kind)}`);
    }
    this.lifecycle.assertActive("createEffect");

    const created = this.invoke("createEffect", () =>
      this.sdk.createEffect(category, effectWireName(kind), payload),
    );
    return this.toEffectId("createEffect", created);
  }

  async createDeviceEffect(
    deviceId: string,
    kind: EffectKind<"generic">,
    payload?: EffectPayload,
  ): Promise<EffectId> {
    if (!isEffectKind("generic", kind)) {
      throw new TypeError(`Unknown generic effect kind: ${String(kind)}`);
    }
    this.lifecycle.assertActive("createDeviceEffect");

    const created = this.invoke("createDeviceEffect", () =>
      this.sdk.createDeviceEffect(deviceId, effectWireName(kind), payload),
    );
    return this.toEffectId("createDeviceEffect", created);
  }

  async setEffect(id: EffectId): Promise<void> {
    this.lifecycle.assertActive("setEffect");
    this.expectSuccess("setEffect", this.invoke("setEffect", () => this.sdk.setEffect(id.toString())));
  }

  async deleteEffect(id: EffectId): Promise<void> {
    this.lifecycle.assertActive("deleteEffect");
    this.expectSuccess(
      "deleteEffect",
      this.invoke("deleteEffect", () => this.sdk.deleteEffect(id.toString())),
    );
  }

  async queryDevice(deviceId: string): Promise<DeviceInfo> {
    this.lifecycle.assertActive("queryDevice");
    const { result, info } = this.invoke("queryDevice", () => this.sdk.queryDevice(deviceId));
    this.expectSuccess("queryDevice", result);
    if (!info) {
      throw new ApiResultError(`queryDevice returned no info for ${deviceId}`, result);
    }
    return info;
  }

  registerEventNotifications(handle: NotificationHandle): void {
    this.lifecycle.assertActive("registerEventNotifications");
    this.expectSuccess(
      "registerEventNotification",
      this.invoke("registerEventNotification", () => this.sdk.registerEventNotification(handle)),
    );
    this.eventsRegistered = true;
  }

  unregisterEventNotifications(): void {
    this.lifecycle.assertActive("unregisterEventNotifications");
    this.expectSuccess(
      "unregisterEventNotification",
      this.invoke("unregisterEventNotification", () => this.sdk.unregisterEventNotification()),
    );
    this.eventsRegistered = false;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Run a binding call; an exception from the binding is a call failure. */
  private invoke<T>(fn: string, call: () => T): T {
    try {
      return call();
    } catch (err) {
      const error = new BackendCallError(
        `Native ${fn} threw`,
        { endpoint: fn, method: "native", resultCode: RESULT_CODES.failed },
        { cause: err },
      );
      this.logger.error("Native SDK call threw", { fn, error });
      throw error;
    }
  }

  private expectSuccess(fn: string, result: ResultCode): void {
    if (isSuccess(result)) return;
    const error = new BackendCallError(`Native ${fn} failed: ${describeResultCode(result)}`, {
      endpoint: fn,
      method: "native",
      resultCode: result,
    });
    this.logger.error("Native SDK call failed", { fn, error });
    throw error;
  }

  private toEffectId(fn: string, created: NativeCreateResult): EffectId {
    this.expectSuccess(fn, created.result);
    const id = EffectId.tryParse(created.effectId);
    if (!id) {
      throw new EffectCreateError(`Native ${fn} returned no effect id`, created.result);
    }
    return id;
  }

  private release(): void {
    if (this.lifecycle.isDisposed) return;
    if (this.eventsRegistered) {
      this.logger.warn("Disposing with event notifications still registered");
    }
    this.lifecycle.transition("disposed", "dispose");
    this.logger.info("Native backend disposed");
  }
}
