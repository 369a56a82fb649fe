/**
 * LightingBackend -- the contract every SDK backend must implement.
 *
 * Two variants exist: the in-process native SDK and the HTTP control plane.
 * Devices only ever talk to this interface.
 */

import type { AppInfo, DeviceInfo } from "../../types/app-info.js";
import type { BackendLifecycleState } from "../backend-lifecycle.js";
import type { DeviceCategory, EffectKind, TypedDeviceCategory } from "../device-category.js";
import type { EffectId } from "../effect-id.js";

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

/**
 * Operations a backend can perform. A `false` entry is permanent: calling the
 * operation fails with `UnsupportedOperationError` without touching the SDK.
 */
export interface BackendCapabilities {
  /** Whether `queryDevice` is available. */
  queryDevice: boolean;
  /** Whether hardware event notifications can be registered. */
  eventNotifications: boolean;
  /** Whether effects can be created on generic devices by id. */
  genericDevices: boolean;
}

export type BackendKind = "native" | "rest";

/** Opaque effect parameters, forwarded to the SDK unchanged. */
export type EffectPayload = unknown;

/** Platform handle that receives hardware event notifications. */
export type NotificationHandle = bigint | number;

// ---------------------------------------------------------------------------
// LightingBackend
// ---------------------------------------------------------------------------

export interface LightingBackend {
  readonly kind: BackendKind;
  readonly capabilities: BackendCapabilities;
  readonly state: BackendLifecycleState;

  /** Start a session. Only legal once, from "uninitialized". */
  initialize(appInfo: AppInfo): Promise<void>;
  /** Tear the session down with the SDK, then release local resources. Idempotent. */
  uninitialize(): Promise<void>;
  /** Release local resources without talking to the SDK. Idempotent. */
  dispose(): Promise<void>;

  /** Generic devices are addressed by id: `createEffect("generic", …)` is unsupported. */
  createEffect<C extends DeviceCategory>(
    category: C,
    kind: EffectKind<C>,
    payload?: EffectPayload,
  ): Promise<EffectId>;
  createDeviceEffect(
    deviceId: string,
    kind: EffectKind<"generic">,
    payload?: EffectPayload,
  ): Promise<EffectId>;
  /** Make a previously created effect the active one. */
  setEffect(id: EffectId): Promise<void>;
  deleteEffect(id: EffectId): Promise<void>;

  queryDevice(deviceId: string): Promise<DeviceInfo>;
  registerEventNotifications(handle: NotificationHandle): void;
  unregisterEventNotifications(): void;
}

/** Categories `createEffect` accepts; generic devices go through `createDeviceEffect`. */
export function isTypedCategory(category: DeviceCategory): category is TypedDeviceCategory {
  return category !== "generic";
}
