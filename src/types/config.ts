import { glowlineConfigSchema } from "../config/config-schema.js";

export type BackendPreference = "auto" | "native" | "rest";

/** Glowline configuration with sensible defaults */
export interface GlowlineConfig {
  /** Which backend to use; "auto" prefers the native SDK when it is available */
  backend?: BackendPreference; // default: "auto"

  // Control plane
  endpoint?: string; // default: "http://localhost:54235"
  heartbeatIntervalMs?: number; // default: 1000
  maxHeartbeatFailures?: number; // default: 3 consecutive failures
  requestTimeoutMs?: number; // default: 5000

  // Devices
  genericDeviceAllowList?: string[]; // default: [] (no generic devices)
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<GlowlineConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  backend: "auto",
  endpoint: "http://localhost:54235",
  heartbeatIntervalMs: 1000,
  maxHeartbeatFailures: 3,
  requestTimeoutMs: 5000,
  genericDeviceAllowList: [],
};

export function resolveConfig(config: GlowlineConfig = {}): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = glowlineConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.error.message}`);
  }

  const resolved: ResolvedConfig = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(validation.data)) {
    if (value === undefined) continue;
    Object.assign(resolved, { [key]: value });
  }
  resolved.endpoint = resolved.endpoint.replace(/\/$/, "");
  resolved.genericDeviceAllowList = resolved.genericDeviceAllowList.map((id) => id.toLowerCase());
  return resolved;
}
