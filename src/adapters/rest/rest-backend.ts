/**
 * RestBackend -- LightingBackend over the SDK's local HTTP control plane.
 *
 * Owns the session: the discovery handshake, the immutable session record
 * every later call reads, and the heartbeat that keeps it alive.
 */

import { BackendLifecycle, type BackendLifecycleState } from "../../core/backend-lifecycle.js";
import {
  CATEGORY_PATHS,
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
} from "../../core/interfaces/lighting-backend.js";
import { describeResultCode, isSuccess, RESULT_CODES } from "../../core/result-code.js";
import { TypedEventEmitter } from "../../core/typed-emitter.js";
import {
  ApiResultError,
  BackendCallError,
  BackendInitError,
  EffectCreateError,
  InvalidStateError,
  UnsupportedOperationError,
} from "../../errors.js";
import type { Logger } from "../../interfaces/logger.js";
import { appInfoSchema, toWireAppInfo } from "../../types/app-info-schema.js";
import type { AppInfo, DeviceInfo } from "../../types/app-info.js";
import { DEFAULT_CONFIG } from "../../types/config.js";
import { componentLogger, noopLogger } from "../../utils/noop-logger.js";
import { Heartbeat } from "./heartbeat.js";
import { type HttpMethod, RestClient, type RestResponse } from "./rest-client.js";
import {
  type CallResponse,
  type CreateEffectResponse,
  callResponseSchema,
  createEffectResponseSchema,
  type HandshakeResponse,
  type HeartbeatResponse,
  handshakeResponseSchema,
  heartbeatResponseSchema,
} from "./rest-schemas.js";

export const HANDSHAKE_PATH = "/razer/chromasdk";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Session data published once the handshake succeeds. Replaced whole, never mutated. */
export interface RestSession {
  readonly sessionId: number;
  readonly baseUrl: string;
}

export interface SessionHealth {
  healthy: boolean;
  consecutiveFailures: number;
  lastError: unknown;
}

export interface RestBackendEvents {
  heartbeat: { tick: number };
  heartbeat_failed: { error: unknown; consecutiveFailures: number };
  session_recovered: { afterFailures: number };
  /** The heartbeat gave up; the server will expire the session. */
  session_lost: { error: unknown; consecutiveFailures: number };
}

export interface RestBackendOptions {
  endpoint?: string;
  heartbeatIntervalMs?: number;
  maxHeartbeatFailures?: number;
  requestTimeoutMs?: number;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// RestBackend
// ---------------------------------------------------------------------------

export class RestBackend extends TypedEventEmitter<RestBackendEvents> implements LightingBackend {
  readonly kind = "rest" as const;

  readonly capabilities: BackendCapabilities = {
    queryDevice: false,
    eventNotifications: false,
    genericDevices: false,
  };

  private readonly endpoint: string;
  private readonly logger: Logger;
  private readonly client: RestClient;
  private readonly heartbeat: Heartbeat;
  private readonly lifecycle = new BackendLifecycle();

  private session: RestSession | null = null;
  private teardown: Promise<void> | null = null;
  private lastHeartbeatError: unknown = null;
  private sessionLost = false;

  constructor(options: RestBackendOptions = {}) {
    super();
    this.endpoint = (options.endpoint ?? DEFAULT_CONFIG.endpoint).replace(/\/$/, "");
    this.logger = componentLogger(options.logger ?? noopLogger, "rest-backend");
    this.client = new RestClient({
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    });
    this.heartbeat = new Heartbeat({
      intervalMs: options.heartbeatIntervalMs ?? DEFAULT_CONFIG.heartbeatIntervalMs,
      maxFailures: options.maxHeartbeatFailures ?? DEFAULT_CONFIG.maxHeartbeatFailures,
      logger: this.logger,
      send: () => this.sendHeartbeat(),
      onTick: (tick) => {
        this.logger.debug?.("Heartbeat complete", { tick });
        this.emit("heartbeat", { tick });
      },
      onFailure: (error, consecutiveFailures) => {
        this.lastHeartbeatError = error;
        this.logger.error("Heartbeat call failed", { error, consecutiveFailures });
        this.emit("heartbeat_failed", { error, consecutiveFailures });
      },
      onRecovered: (afterFailures) => {
        this.lastHeartbeatError = null;
        this.logger.info("Heartbeat recovered", { afterFailures });
        this.emit("session_recovered", { afterFailures });
      },
      onLost: (error, consecutiveFailures) => {
        this.sessionLost = true;
        this.logger.error("Heartbeat stopped, session considered lost", {
          error,
          consecutiveFailures,
        });
        this.emit("session_lost", { error, consecutiveFailures });
      },
    });
    this.logger.info("REST backend created", { endpoint: this.endpoint });
  }

  get state(): BackendLifecycleState {
    return this.lifecycle.state;
  }

  /** Address the next call goes to: the session URI once active, the discovery endpoint before. */
  get baseUrl(): string {
    return this.session?.baseUrl ?? this.endpoint;
  }

  get sessionId(): number | null {
    return this.session?.sessionId ?? null;
  }

  get heartbeatRunning(): boolean {
    return this.heartbeat.isRunning;
  }

  get health(): SessionHealth {
    return {
      healthy: this.lifecycle.isActive && !this.sessionLost && this.heartbeat.failures === 0,
      consecutiveFailures: this.heartbeat.failures,
      lastError: this.lastHeartbeatError,
    };
  }

  protected override onListenerError(event: keyof RestBackendEvents, error: unknown): void {
    this.logger.error("Event listener threw", { event, error });
  }

  // -------------------------------------------------------------------------
  // Session lifecycle
  // -------------------------------------------------------------------------

  async initialize(appInfo: AppInfo): Promise<void> {
    this.lifecycle.transition("initializing", "initialize");
    const handshakeUrl = `${this.endpoint}${HANDSHAKE_PATH}`;

    const info = appInfoSchema.safeParse(appInfo);
    if (!info.success) {
      this.lifecycle.transition("uninitialized", "initialize");
      throw new BackendInitError(`Invalid application info: ${info.error.message}`, {
        endpoint: handshakeUrl,
      });
    }

    this.logger.info("Initializing session via handshake", { endpoint: handshakeUrl });

    let response: RestResponse<HandshakeResponse>;
    try {
      response = await this.client.request({
        baseUrl: this.endpoint,
        method: "POST",
        path: HANDSHAKE_PATH,
        body: toWireAppInfo(info.data),
        schema: handshakeResponseSchema,
      });
    } catch (err) {
      this.assertStillInitializing();
      this.lifecycle.transition("uninitialized", "initialize");
      const error = new BackendInitError(
        "Failed to reach the control plane",
        { endpoint: handshakeUrl },
        { cause: err },
      );
      this.logger.error("Session initialization failed", { error });
      throw error;
    }
    this.assertStillInitializing();

    if (!response.ok || !response.data) {
      this.lifecycle.transition("uninitialized", "initialize");
      const error = new BackendInitError(
        response.ok
          ? "Control plane returned no session data"
          : `Failed to initialize control plane session (HTTP ${response.status})`,
        { endpoint: handshakeUrl, status: response.status },
      );
      this.logger.error("Session initialization failed", { error });
      throw error;
    }

    this.session = Object.freeze({
      sessionId: response.data.session,
      baseUrl: response.data.uri.replace(/\/$/, ""),
    });
    this.lifecycle.transition("active", "initialize");
    this.logger.info("New control plane session", {
      sessionId: this.session.sessionId,
      baseUrl: this.session.baseUrl,
    });
    this.heartbeat.start();
  }

  async uninitialize(): Promise<void> {
    if (this.lifecycle.isDisposed) return;
    // The first caller owns the teardown outcome; later callers only wait for it.
    if (this.teardown) return this.teardown.then(noop, noop);
    if (!this.lifecycle.isActive) {
      this.release();
      return;
    }

    this.teardown = (async () => {
      try {
        await this.callForResult("DELETE", "/", undefined, "uninitialize");
        this.logger.info("Session uninitialized", { sessionId: this.sessionId });
      } finally {
        this.release();
      }
    })();
    return this.teardown;
  }

  async dispose(): Promise<void> {
    if (this.lifecycle.isDisposed) return;
    this.release();
  }

  // -------------------------------------------------------------------------
  // Effects
  // -------------------------------------------------------------------------

  async createEffect<C extends DeviceCategory>(
    category: C,
    kind: EffectKind<C>,
    payload?: EffectPayload,
  ): Promise<EffectId> {
    if (!isTypedCategory(category)) {
      throw new UnsupportedOperationError(
        "createEffect",
        "The control plane has no endpoint for generic devices",
      );
    }
    if (!isEffectKind(category, kind)) {
      throw new TypeError(`Unknown ${category} effect kind: ${String(kind)}`);
    }
    const session = this.requireSession("createEffect");
    const path = CATEGORY_PATHS[category];
    const body =
      payload === undefined
        ? { effect: effectWireName(kind) }
        : { effect: effectWireName(kind), param: payload };

    const response: RestResponse<CreateEffectResponse> = await this.client.request({
      baseUrl: session.baseUrl,
      method: "POST",
      path,
      body,
      schema: createEffectResponseSchema,
    });

    if (!response.ok) {
      const error = new BackendCallError(`Failed to create effect at ${path}`, {
        endpoint: response.url,
        method: "POST",
        status: response.status,
        resultCode: response.data?.result ?? RESULT_CODES.failed,
      });
      this.logger.error("Failed to create effect", { error, category, kind });
      throw error;
    }

    const data = response.data;
    if (!data) {
      throw new EffectCreateError("Effect creation API returned no usable response", RESULT_CODES.failed);
    }
    if (!isSuccess(data.result)) {
      throw new EffectCreateError(
        `Backend rejected ${category} effect ${kind}: ${describeResultCode(data.result)}`,
        data.result,
      );
    }
    const id = EffectId.tryParse(data.effectId);
    if (!id) {
      throw new EffectCreateError("Got no effect id from creating effect", data.result);
    }

    this.logger.debug?.("Created effect", { category, kind, effectId: id.toString() });
    return id;
  }

  async createDeviceEffect(): Promise<EffectId> {
    throw new UnsupportedOperationError(
      "createDeviceEffect",
      "The control plane does not support generic device effects",
    );
  }

  async setEffect(id: EffectId): Promise<void> {
    this.requireSession("setEffect");
    await this.callForResult("PUT", "/effect", { id: id.toString() }, "setEffect");
  }

  async deleteEffect(id: EffectId): Promise<void> {
    this.requireSession("deleteEffect");
    await this.callForResult("DELETE", "/effect", { id: id.toString() }, "deleteEffect");
  }

  // -------------------------------------------------------------------------
  // Unsupported capabilities
  // -------------------------------------------------------------------------

  async queryDevice(): Promise<DeviceInfo> {
    throw new UnsupportedOperationError(
      "queryDevice",
      "The control plane does not support device querying",
    );
  }

  registerEventNotifications(): void {
    throw new UnsupportedOperationError(
      "registerEventNotifications",
      "Event notifications are not supported by the control plane",
    );
  }

  unregisterEventNotifications(): void {
    throw new UnsupportedOperationError(
      "unregisterEventNotifications",
      "Event notifications are not supported by the control plane",
    );
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private requireSession(operation: string): RestSession {
    this.lifecycle.assertActive(operation);
    const session = this.session;
    if (!session) throw new InvalidStateError(operation, this.lifecycle.state);
    return session;
  }

  /** Send a request whose body is `{ result }`, checking HTTP status and logical result. */
  private async callForResult(
    method: HttpMethod,
    path: string,
    body: unknown,
    operation: string,
  ): Promise<void> {
    const session = this.requireSession(operation);
    const response: RestResponse<CallResponse> = await this.client.request({
      baseUrl: session.baseUrl,
      method,
      path,
      body,
      schema: callResponseSchema,
    });

    if (!response.ok) {
      const error = new BackendCallError(`${operation} call failed (HTTP ${response.status})`, {
        endpoint: response.url,
        method,
        status: response.status,
        resultCode: response.data?.result ?? RESULT_CODES.failed,
      });
      this.logger.error(`${operation} call failed`, { error });
      throw error;
    }
    if (!response.data) {
      throw new ApiResultError(`${operation} API returned no usable response`, RESULT_CODES.failed);
    }
    if (!isSuccess(response.data.result)) {
      throw new ApiResultError(
        `${operation} API reported ${describeResultCode(response.data.result)}`,
        response.data.result,
      );
    }
  }

  private async sendHeartbeat(): Promise<number> {
    const session = this.requireSession("heartbeat");
    const response: RestResponse<HeartbeatResponse> = await this.client.request({
      baseUrl: session.baseUrl,
      method: "PUT",
      path: "/heartbeat",
      schema: heartbeatResponseSchema,
    });

    if (!response.ok) {
      throw new BackendCallError(`Call to heartbeat API failed (HTTP ${response.status})`, {
        endpoint: response.url,
        method: "PUT",
        status: response.status,
        resultCode: RESULT_CODES.failed,
      });
    }
    if (!response.data) {
      throw new ApiResultError("Got no tick from heartbeat call", RESULT_CODES.failed);
    }
    return response.data.tick;
  }

  /** A handshake that settles after dispose() is stale and must not arm anything. */
  private assertStillInitializing(): void {
    if (this.lifecycle.state !== "initializing") {
      throw new InvalidStateError("initialize", this.lifecycle.state);
    }
  }

  private release(): void {
    if (this.lifecycle.isDisposed) return;
    this.heartbeat.stop();
    this.client.close();
    this.session = null;
    this.lifecycle.transition("disposed", "dispose");
    this.logger.info("REST backend disposed");
  }
}

function noop(): void {}
