import type { ResultCode } from "./core/result-code.js";

export class GlowlineError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GlowlineError";
    this.code = code;
  }
}

// ── Backend errors ──

export interface BackendInitErrorDetails {
  endpoint: string;
  status?: number;
  resultCode?: ResultCode;
}

/** The handshake or initial SDK call failed, or returned nothing usable. */
export class BackendInitError extends GlowlineError {
  readonly endpoint: string;
  readonly status: number | undefined;
  readonly resultCode: ResultCode | undefined;

  constructor(message: string, details: BackendInitErrorDetails, options?: ErrorOptions) {
    super(message, "BACKEND_INIT", options);
    this.name = "BackendInitError";
    this.endpoint = details.endpoint;
    this.status = details.status;
    this.resultCode = details.resultCode;
  }
}

export interface BackendCallErrorDetails {
  endpoint: string;
  method: string;
  status?: number;
  resultCode: ResultCode;
}

/**
 * A backend call failed at the transport layer or reported a non-success
 * status. These are the only failures worth retrying.
 */
export class BackendCallError extends GlowlineError {
  readonly endpoint: string;
  readonly method: string;
  readonly status: number | undefined;
  readonly resultCode: ResultCode;

  constructor(message: string, details: BackendCallErrorDetails, options?: ErrorOptions) {
    super(message, "BACKEND_CALL", options);
    this.name = "BackendCallError";
    this.endpoint = details.endpoint;
    this.method = details.method;
    this.status = details.status;
    this.resultCode = details.resultCode;
  }
}

/** The backend accepted the call but its body reports a logical failure. */
export class ApiResultError extends GlowlineError {
  readonly resultCode: ResultCode;

  constructor(message: string, resultCode: ResultCode, code = "API_RESULT", options?: ErrorOptions) {
    super(message, code, options);
    this.name = "ApiResultError";
    this.resultCode = resultCode;
  }
}

export class EffectCreateError extends ApiResultError {
  constructor(message: string, resultCode: ResultCode, options?: ErrorOptions) {
    super(message, resultCode, "EFFECT_CREATE", options);
    this.name = "EffectCreateError";
  }
}

// ── Capability and lifecycle errors ──

export class UnsupportedOperationError extends GlowlineError {
  readonly operation: string;

  constructor(operation: string, message?: string) {
    super(message ?? `Operation "${operation}" is not supported`, "UNSUPPORTED_OPERATION");
    this.name = "UnsupportedOperationError";
    this.operation = operation;
  }
}

export class UnsupportedDeviceError extends GlowlineError {
  readonly deviceId: string;

  constructor(deviceId: string) {
    super(`Device ${deviceId} is not a recognized generic device`, "UNSUPPORTED_DEVICE");
    this.name = "UnsupportedDeviceError";
    this.deviceId = deviceId;
  }
}

export class InvalidStateError extends GlowlineError {
  readonly operation: string;
  readonly state: string;

  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while backend is ${state}`, "INVALID_STATE");
    this.name = "InvalidStateError";
    this.operation = operation;
    this.state = state;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to GlowlineError (preserves cause chain). */
export function toGlowlineError(value: unknown): GlowlineError {
  if (value instanceof GlowlineError) return value;
  if (value instanceof Error) return new GlowlineError(value.message, "UNKNOWN", { cause: value });
  return new GlowlineError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** True only for transport-level failures; logical and capability errors never succeed on retry. */
export function isRetryableError(value: unknown): boolean {
  return value instanceof BackendCallError;
}
