import { z } from "zod";

const positiveMs = z.number().int().positive();

const uuid = z
  .string()
  .regex(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i, "must be a UUID");

export const glowlineConfigSchema = z
  .object({
    backend: z.enum(["auto", "native", "rest"]).optional(),

    // Control plane
    endpoint: z.string().url().optional(),
    heartbeatIntervalMs: positiveMs.optional(),
    maxHeartbeatFailures: z.number().int().min(1).optional(),
    requestTimeoutMs: positiveMs.optional(),

    // Devices
    genericDeviceAllowList: z.array(uuid).optional(),
  })
  .strict();
