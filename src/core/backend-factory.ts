import { NativeBackend } from "../adapters/native/native-backend.js";
import { RestBackend } from "../adapters/rest/rest-backend.js";
import { BackendInitError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { NativeSdk, SdkProbe } from "../interfaces/native-sdk.js";
import type { ResolvedConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { LightingBackend } from "./interfaces/lighting-backend.js";

export interface BackendFactoryDeps {
  /** Binding for the in-process SDK, when the application has one. */
  nativeSdk?: NativeSdk;
  /** Reports whether the SDK is installed and enabled on this machine. */
  probe?: SdkProbe;
  logger?: Logger;
}

/**
 * Build the backend `config.backend` asks for. With "auto", the native SDK is
 * used when a binding is supplied and the probe (if any) reports it available;
 * everything else falls back to the control plane.
 */
export function createBackend(config: ResolvedConfig, deps: BackendFactoryDeps = {}): LightingBackend {
  const logger = deps.logger ?? noopLogger;

  const rest = () =>
    new RestBackend({
      endpoint: config.endpoint,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      maxHeartbeatFailures: config.maxHeartbeatFailures,
      requestTimeoutMs: config.requestTimeoutMs,
      logger,
    });

  switch (config.backend) {
    case "rest":
      return rest();
    case "native": {
      if (!deps.nativeSdk) {
        throw new BackendInitError("Native backend requested but no SDK binding was supplied", {
          endpoint: "native",
        });
      }
      return new NativeBackend({ sdk: deps.nativeSdk, logger });
    }
    case "auto": {
      if (!deps.nativeSdk) {
        logger.info("No native SDK binding, using control plane", { component: "backend-factory" });
        return rest();
      }
      const available = deps.probe?.isSdkAvailable() ?? true;
      if (!available) {
        logger.info("Native SDK not available, using control plane", {
          component: "backend-factory",
        });
        return rest();
      }
      const version = deps.probe?.sdkVersion();
      logger.info("Using native SDK", {
        component: "backend-factory",
        sdkVersion: version ? `${version.major}.${version.minor}.${version.revision}` : "unknown",
      });
      return new NativeBackend({ sdk: deps.nativeSdk, logger });
    }
  }
}
