import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { EffectId } from "./effect-id.js";

const SAMPLE = "11111111-1111-1111-1111-111111111111";

describe("EffectId", () => {
  it("parses a UUID and renders it back", () => {
    const id = EffectId.parse(SAMPLE);
    expect(id.toString()).toBe(SAMPLE);
    expect(id.isNone).toBe(false);
  });

  it("normalizes case and surrounding whitespace", () => {
    const upper = EffectId.parse("  ABCDEF01-2345-6789-ABCD-EF0123456789 ");
    expect(upper.toString()).toBe("abcdef01-2345-6789-abcd-ef0123456789");
    expect(upper.equals(EffectId.parse("abcdef01-2345-6789-abcd-ef0123456789"))).toBe(true);
  });

  it("maps the all-zero id to NONE", () => {
    const zero = EffectId.parse("00000000-0000-0000-0000-000000000000");
    expect(zero).toBe(EffectId.NONE);
    expect(zero.isNone).toBe(true);
  });

  it("rejects non-UUID input", () => {
    expect(() => EffectId.parse("not-an-id")).toThrow(TypeError);
    expect(() => EffectId.parse("not-an-id")).toThrow('Invalid effect id: "not-an-id"');
    expect(EffectId.tryParse("")).toBeNull();
    expect(EffectId.tryParse(42)).toBeNull();
    expect(EffectId.tryParse(null)).toBeNull();
  });

  it("serializes to its string form in JSON", () => {
    expect(JSON.stringify({ id: EffectId.parse(SAMPLE) })).toBe(`{"id":"${SAMPLE}"}`);
  });

  it("equality follows the normalized value", () => {
    fc.assert(
      fc.property(fc.uuid(), (uuid) => {
        const lower = EffectId.parse(uuid);
        const upper = EffectId.parse(uuid.toUpperCase());
        expect(lower.equals(upper)).toBe(true);
        expect(upper.toString()).toBe(uuid.toLowerCase());
      }),
    );
  });
});
