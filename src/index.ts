/**
 * Glowline public API barrel.
 * @module
 */

// Facade
export type { GlowlineEvents, GlowlineOptions } from "./glowline.js";
export { Glowline } from "./glowline.js";

// Backends
export type { NativeBackendOptions } from "./adapters/native/native-backend.js";
export { NativeBackend } from "./adapters/native/native-backend.js";
export type {
  RestBackendEvents,
  RestBackendOptions,
  RestSession,
  SessionHealth,
} from "./adapters/rest/rest-backend.js";
export { HANDSHAKE_PATH, RestBackend } from "./adapters/rest/rest-backend.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { BackendFactoryDeps } from "./core/backend-factory.js";
export { createBackend } from "./core/backend-factory.js";

// Core
export type { BackendLifecycleState } from "./core/backend-lifecycle.js";
export { BackendLifecycle } from "./core/backend-lifecycle.js";
export type { Color } from "./core/color.js";
export { BLACK, colorChannels, rgb, WHITE } from "./core/color.js";
export type { DeviceCategory, EffectKind, TypedDeviceCategory } from "./core/device-category.js";
export {
  DEVICE_CATEGORIES,
  EFFECT_KINDS,
  isDeviceCategory,
  isEffectKind,
} from "./core/device-category.js";
export { EffectId } from "./core/effect-id.js";
export type {
  BackendCapabilities,
  BackendKind,
  EffectPayload,
  LightingBackend,
  NotificationHandle,
} from "./core/interfaces/lighting-backend.js";
export type { ResultCode, ResultCodeName } from "./core/result-code.js";
export { describeResultCode, isSuccess, RESULT_CODES } from "./core/result-code.js";

// Devices
export type { DeviceOptions, StaticEffect } from "./devices/device.js";
export { CategoryDevice, Device } from "./devices/device.js";
export type { CategoryDevices, DeviceDirectoryOptions } from "./devices/device-directory.js";
export { DeviceDirectory } from "./devices/device-directory.js";
export { GenericDevice } from "./devices/generic-device.js";
export { Headset } from "./devices/headset.js";
export { KEYBOARD_COLUMNS, KEYBOARD_ROWS, Keyboard } from "./devices/keyboard.js";
export { Keypad } from "./devices/keypad.js";
export { LINK_DEVICE_POSITIONS, LinkDevice } from "./devices/link-device.js";
export { Mouse } from "./devices/mouse.js";
export { Mousepad } from "./devices/mousepad.js";

// Config
export { loadConfigFile } from "./config/config-file.js";
export type { BackendPreference, GlowlineConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";

// Errors
export {
  ApiResultError,
  BackendCallError,
  BackendInitError,
  EffectCreateError,
  errorMessage,
  GlowlineError,
  InvalidStateError,
  isRetryableError,
  toGlowlineError,
  UnsupportedDeviceError,
  UnsupportedOperationError,
} from "./errors.js";

// Interfaces and types
export type { LogContext, Logger } from "./interfaces/logger.js";
export type {
  NativeCreateResult,
  NativeQueryResult,
  NativeSdk,
  SdkProbe,
} from "./interfaces/native-sdk.js";
export type { AppInfo, DeviceInfo, SdkVersion } from "./types/app-info.js";
export { componentLogger, noopLogger } from "./utils/noop-logger.js";
