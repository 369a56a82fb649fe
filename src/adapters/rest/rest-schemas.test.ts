import { describe, expect, it } from "vitest";
import { callResponseSchema, createEffectResponseSchema, resultSchema } from "./rest-schemas.js";

describe("resultSchema", () => {
  it("normalizes boolean results to result codes", () => {
    expect(resultSchema.parse(true)).toBe(0);
    expect(resultSchema.parse(false)).toBe(-2147467259);
  });

  it("passes numeric codes through", () => {
    expect(resultSchema.parse(0)).toBe(0);
    expect(resultSchema.parse(4319)).toBe(4319);
  });

  it("rejects other shapes", () => {
    expect(resultSchema.safeParse("ok").success).toBe(false);
    expect(resultSchema.safeParse(1.5).success).toBe(false);
  });
});

describe("response schemas", () => {
  it("requires a result field", () => {
    expect(callResponseSchema.safeParse({}).success).toBe(false);
  });

  it("accepts a create response with a missing or null effect id", () => {
    expect(createEffectResponseSchema.parse({ result: 0 })).toEqual({ result: 0 });
    expect(createEffectResponseSchema.parse({ result: true, effectId: null })).toEqual({
      result: 0,
      effectId: null,
    });
  });
});
