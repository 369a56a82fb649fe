import { z } from "zod";
import { RESULT_CODES, type ResultCode } from "../../core/result-code.js";

/**
 * The control plane reports logical outcomes either as a boolean or as a
 * numeric SDK result code; both normalize to a `ResultCode`.
 */
export const resultSchema = z
  .union([z.boolean(), z.number().int()])
  .transform((value): ResultCode => {
    if (typeof value === "number") return value;
    return value ? RESULT_CODES.success : RESULT_CODES.failed;
  });

/** `POST /razer/chromasdk` */
export const handshakeResponseSchema = z.object({
  session: z.number().int(),
  uri: z.string().url(),
});

/** `DELETE /`, `PUT /effect`, `DELETE /effect` */
export const callResponseSchema = z.object({
  result: resultSchema,
});

/** `POST /<category>` */
export const createEffectResponseSchema = z.object({
  result: resultSchema,
  effectId: z.string().nullable().optional(),
});

/** `PUT /heartbeat` */
export const heartbeatResponseSchema = z.object({
  tick: z.number().int(),
});

export type HandshakeResponse = z.infer<typeof handshakeResponseSchema>;
export type CallResponse = z.infer<typeof callResponseSchema>;
export type CreateEffectResponse = z.infer<typeof createEffectResponseSchema>;
export type HeartbeatResponse = z.infer<typeof heartbeatResponseSchema>;
