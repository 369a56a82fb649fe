import { beforeEach, describe, expect, it, vi } from "vitest";
import type { DeviceCategory } from "../../core/device-category.js";
import { EffectId } from "../../core/effect-id.js";
import { RESULT_CODES } from "../../core/result-code.js";
import {
  ApiResultError,
  BackendCallError,
  BackendInitError,
  EffectCreateError,
  InvalidStateError,
  UnsupportedOperationError,
} from "../../errors.js";
import { FakeNativeSdk } from "../../testing/fake-native-sdk.js";
import { makeAppInfo } from "../../testing/fixtures.js";
import { NativeBackend } from "./native-backend.js";

const DEVICE_ID = "0ed4d3fa-2d85-4a2b-9d59-4e5f0b1a7c21";
const FIRST_ID = "00000000-0000-0000-0000-000000000001";

let sdk: FakeNativeSdk;

beforeEach(() => {
  sdk = new FakeNativeSdk();
});

async function activeBackend(): Promise<NativeBackend> {
  const backend = new NativeBackend({ sdk });
  await backend.initialize(makeAppInfo());
  return backend;
}

function anyCategory(category: DeviceCategory): DeviceCategory {
  return category;
}

describe("initialize", () => {
  it("passes the validated application info to the SDK", async () => {
    const backend = await activeBackend();
    expect(backend.state).toBe("active");
    expect(sdk.callsTo("init")).toEqual([[makeAppInfo()]]);
  });

  it("fails with the SDK result code and can be retried", async () => {
    sdk.results.init = RESULT_CODES.singleInstanceApp;
    const backend = new NativeBackend({ sdk });

    const error = await backend.initialize(makeAppInfo()).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BackendInitError);
    expect(error).toMatchObject({
      message: "Native SDK init failed: singleInstanceApp (1152)",
      resultCode: 1152,
    });
    expect(backend.state).toBe("uninitialized");

    sdk.results.init = RESULT_CODES.success;
    await backend.initialize(makeAppInfo());
    expect(backend.state).toBe("active");
  });

  it("wraps a throwing binding", async () => {
    sdk.throwing.add("init");
    const backend = new NativeBackend({ sdk });

    const error = await backend.initialize(makeAppInfo()).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BackendInitError);
    expect(error).toHaveProperty("cause.message", "init crashed");
  });

  it("rejects invalid application info before calling the SDK", async () => {
    const backend = new NativeBackend({ sdk });
    await expect(backend.initialize(makeAppInfo({ title: "" }))).rejects.toBeInstanceOf(
      BackendInitError,
    );
    expect(sdk.calls).toHaveLength(0);
  });
});

describe("effects", () => {
  it("creates category effects with the wire effect name", async () => {
    const backend = await activeBackend();
    const id = await backend.createEffect("mouse", "spectrum_cycling", { speed: 1 });

    expect(id.toString()).toBe(FIRST_ID);
    expect(sdk.callsTo("createEffect")).toEqual([
      ["mouse", "CHROMA_SPECTRUM_CYCLING", { speed: 1 }],
    ]);
  });

  it("creates effects on generic devices by id", async () => {
    const backend = await activeBackend();
    const id = await backend.createDeviceEffect(DEVICE_ID, "blinking");

    expect(id.toString()).toBe(FIRST_ID);
    expect(sdk.callsTo("createDeviceEffect")).toEqual([[DEVICE_ID, "CHROMA_BLINKING", undefined]]);
  });

  it("sets and deletes effects by id", async () => {
    const backend = await activeBackend();
    const id = EffectId.parse(FIRST_ID);

    await backend.setEffect(id);
    await backend.deleteEffect(id);

    expect(sdk.callsTo("setEffect")).toEqual([[FIRST_ID]]);
    expect(sdk.callsTo("deleteEffect")).toEqual([[FIRST_ID]]);
  });

  it("maps a failing create to BackendCallError with the result code", async () => {
    sdk.results.createEffect = RESULT_CODES.deviceNotAvailable;
    const backend = await activeBackend();

    await expect(backend.createEffect("keyboard", "static")).rejects.toMatchObject({
      name: "BackendCallError",
      message: "Native createEffect failed: deviceNotAvailable (4319)",
      resultCode: 4319,
    });
  });

  it("fails when the SDK reports success without an id", async () => {
    sdk.omitEffectId = true;
    const backend = await activeBackend();

    await expect(backend.createEffect("keyboard", "static")).rejects.toBeInstanceOf(
      EffectCreateError,
    );
  });

  it("wraps a throwing binding call", async () => {
    sdk.throwing.add("setEffect");
    const backend = await activeBackend();

    const error = await backend.setEffect(EffectId.parse(FIRST_ID)).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BackendCallError);
    expect(error).toMatchObject({ message: "Native setEffect threw", method: "native" });
  });

  it("rejects the generic category and unknown kinds without calling the SDK", async () => {
    const backend = await activeBackend();

    await expect(backend.createEffect("generic", "static")).rejects.toBeInstanceOf(
      UnsupportedOperationError,
    );
    await expect(backend.createEffect(anyCategory("headset"), "wave")).rejects.toThrow(TypeError);
    expect(sdk.callsTo("createEffect")).toHaveLength(0);
  });

  it("requires an active backend", async () => {
    const backend = new NativeBackend({ sdk });
    await expect(backend.createEffect("keyboard", "none")).rejects.toBeInstanceOf(
      InvalidStateError,
    );
  });
});

describe("queryDevice", () => {
  it("returns the device info", async () => {
    sdk.devices.set(DEVICE_ID, { type: "keyboard", connected: true });
    const backend = await activeBackend();

    expect(await backend.queryDevice(DEVICE_ID)).toEqual({ type: "keyboard", connected: true });
  });

  it("fails when the SDK has no info for the device", async () => {
    const backend = await activeBackend();
    await expect(backend.queryDevice(DEVICE_ID)).rejects.toBeInstanceOf(ApiResultError);
  });
});

describe("event notifications", () => {
  it("registers and unregisters a handle", async () => {
    const backend = await activeBackend();
    backend.registerEventNotifications(0x1234n);
    backend.unregisterEventNotifications();

    expect(sdk.callsTo("registerEventNotification")).toEqual([[0x1234n]]);
    expect(sdk.callsTo("unregisterEventNotification")).toEqual([[]]);
  });

  it("warns when disposed with notifications still registered", async () => {
    const warn = vi.fn();
    const backend = new NativeBackend({
      sdk,
      logger: { info: vi.fn(), warn, error: vi.fn() },
    });
    await backend.initialize(makeAppInfo());
    backend.registerEventNotifications(1);
    await backend.dispose();

    expect(warn).toHaveBeenCalledWith("Disposing with event notifications still registered", {
      component: "native-backend",
    });
  });
});

describe("teardown", () => {
  it("uninitializes the SDK once", async () => {
    const backend = await activeBackend();
    await backend.uninitialize();
    await backend.uninitialize();

    expect(sdk.callsTo("uninit")).toHaveLength(1);
    expect(backend.state).toBe("disposed");
  });

  it("disposes even when uninit fails", async () => {
    sdk.results.uninit = RESULT_CODES.failed;
    const backend = await activeBackend();

    await expect(backend.uninitialize()).rejects.toBeInstanceOf(BackendCallError);
    expect(backend.state).toBe("disposed");
  });

  it("dispose makes no SDK call", async () => {
    const backend = await activeBackend();
    await backend.dispose();
    await backend.dispose();

    expect(sdk.callsTo("uninit")).toHaveLength(0);
    await expect(backend.setEffect(EffectId.parse(FIRST_ID))).rejects.toThrow(
      "Cannot setEffect while backend is disposed",
    );
  });

  it("uninitialize before initialize only releases", async () => {
    const backend = new NativeBackend({ sdk });
    await backend.uninitialize();
    expect(backend.state).toBe("disposed");
    expect(sdk.calls).toHaveLength(0);
  });
});
