import { describe, expect, it } from "vitest";
import { makeAppInfo } from "../testing/fixtures.js";
import { appInfoSchema, toWireAppInfo } from "./app-info-schema.js";

describe("appInfoSchema", () => {
  it("accepts a complete application info", () => {
    expect(appInfoSchema.safeParse(makeAppInfo()).success).toBe(true);
  });

  it("enforces title and description limits", () => {
    expect(appInfoSchema.safeParse(makeAppInfo({ title: "x".repeat(257) })).success).toBe(false);
    expect(appInfoSchema.safeParse(makeAppInfo({ description: "x".repeat(1025) })).success).toBe(
      false,
    );
  });

  it("rejects generic or unknown device categories", () => {
    const info = { ...makeAppInfo(), supportedDevices: ["keyboard", "generic"] };
    expect(appInfoSchema.safeParse(info).success).toBe(false);
  });

  it("requires at least one device category", () => {
    expect(appInfoSchema.safeParse(makeAppInfo({ supportedDevices: [] })).success).toBe(false);
  });
});

describe("toWireAppInfo", () => {
  it("renames fields for the control plane and de-duplicates devices", () => {
    const wire = toWireAppInfo(
      makeAppInfo({ supportedDevices: ["link", "headset", "link"], category: "game" }),
    );

    expect(wire).toEqual({
      title: "Test App",
      description: "Lighting test application",
      author: { name: "Test Author", contact: "test@example.com" },
      device_supported: ["chromalink", "headset"],
      category: "game",
    });
  });
});
