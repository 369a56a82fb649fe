/**
 * Contracts for the in-process vendor SDK. Loading the vendor library is
 * outside this package: the application passes a binding that implements
 * `NativeSdk`, and optionally a probe reporting whether the SDK is installed.
 * @module
 */

import type { TypedDeviceCategory } from "../core/device-category.js";
import type { NotificationHandle } from "../core/interfaces/lighting-backend.js";
import type { ResultCode } from "../core/result-code.js";
import type { AppInfo, DeviceInfo, SdkVersion } from "../types/app-info.js";

export interface NativeCreateResult {
  result: ResultCode;
  /** UUID of the new effect; null when the SDK produced none. */
  effectId: string | null;
}

export interface NativeQueryResult {
  result: ResultCode;
  info: DeviceInfo | null;
}

/** Synchronous calls into the native SDK. Every call reports a result code, 0 on success. */
export interface NativeSdk {
  init(appInfo: AppInfo): ResultCode;
  uninit(): ResultCode;
  /** `effect` is the wire name, e.g. `CHROMA_STATIC`; `payload` is forwarded untouched. */
  createEffect(category: TypedDeviceCategory, effect: string, payload: unknown): NativeCreateResult;
  createDeviceEffect(deviceId: string, effect: string, payload: unknown): NativeCreateResult;
  setEffect(effectId: string): ResultCode;
  deleteEffect(effectId: string): ResultCode;
  queryDevice(deviceId: string): NativeQueryResult;
  registerEventNotification(handle: NotificationHandle): ResultCode;
  unregisterEventNotification(): ResultCode;
}

/** Platform check for an installed and enabled SDK. */
export interface SdkProbe {
  isSdkAvailable(): boolean;
  sdkVersion(): SdkVersion | null;
}
