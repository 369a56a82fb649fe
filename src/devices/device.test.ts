import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { BLACK, rgb } from "../core/color.js";
import { EffectId } from "../core/effect-id.js";
import { UnsupportedOperationError } from "../errors.js";
import { effectIdFor } from "../testing/fixtures.js";
import { RecordingBackend } from "../testing/recording-backend.js";
import { GenericDevice } from "./generic-device.js";
import { Headset } from "./headset.js";
import { KEYBOARD_COLUMNS, KEYBOARD_ROWS, Keyboard } from "./keyboard.js";
import { Keypad } from "./keypad.js";
import { LINK_DEVICE_POSITIONS, LinkDevice } from "./link-device.js";
import { Mouse } from "./mouse.js";
import { Mousepad } from "./mousepad.js";

const RED = rgb(255, 0, 0);
const DEVICE_ID = "0ed4d3fa-2d85-4a2b-9d59-4e5f0b1a7c21";

describe("Device", () => {
  it("starts with no effect", () => {
    expect(new Mouse(new RecordingBackend()).currentEffect).toBe(EffectId.NONE);
  });

  it("setEffect creates, activates and records the effect", async () => {
    const backend = new RecordingBackend();
    const mouse = new Mouse(backend);

    const id = await mouse.setEffect("breathing", { color1: RED });

    expect(id.equals(effectIdFor(1))).toBe(true);
    expect(mouse.currentEffect).toBe(id);
    expect(backend.calls).toEqual([
      { op: "createEffect", args: ["mouse", "breathing", { color1: RED }] },
      { op: "setEffect", args: [effectIdFor(1).toString()] },
    ]);
  });

  it("setEffectId activates an existing effect", async () => {
    const backend = new RecordingBackend();
    const pad = new Mousepad(backend);

    await pad.setEffectId(effectIdFor(7));

    expect(pad.currentEffect.equals(effectIdFor(7))).toBe(true);
    expect(backend.callsTo("createEffect")).toHaveLength(0);
  });

  it("leaves the current effect unchanged when activation fails", async () => {
    const backend = new RecordingBackend().fail("setEffect", new Error("rejected"));
    const headset = new Headset(backend);

    await expect(headset.setStatic(RED)).rejects.toThrow("rejected");
    expect(headset.currentEffect).toBe(EffectId.NONE);
  });

  it("deleting the current effect resets it to none", async () => {
    const backend = new RecordingBackend();
    const keypad = new Keypad(backend);
    const id = await keypad.setStatic(RED);

    await keypad.deleteEffect(effectIdFor(99));
    expect(keypad.currentEffect).toBe(id);

    await keypad.deleteEffect(id);
    expect(keypad.currentEffect).toBe(EffectId.NONE);
    expect(backend.callsTo("deleteEffect")).toEqual([
      [effectIdFor(99).toString()],
      [id.toString()],
    ]);
  });

  it("clear is the none effect for every category", async () => {
    const backend = new RecordingBackend();
    const devices = [
      new Keyboard(backend),
      new Mouse(backend),
      new Mousepad(backend),
      new Headset(backend),
      new Keypad(backend),
      new LinkDevice(backend),
    ];

    for (const device of devices) await device.clear();

    expect(backend.callsTo("createEffect")).toEqual([
      ["keyboard", "none", undefined],
      ["mouse", "none", undefined],
      ["mousepad", "none", undefined],
      ["headset", "none", undefined],
      ["keypad", "none", undefined],
      ["link", "none", undefined],
    ]);
  });

  it("setAll is a static effect", async () => {
    const backend = new RecordingBackend();
    await new Keyboard(backend).setAll(RED);
    expect(backend.callsTo("createEffect")).toEqual([["keyboard", "static", { color: RED }]]);
  });
});

describe("Keyboard", () => {
  it("sends a full custom grid", async () => {
    const backend = new RecordingBackend();
    const grid = Array.from({ length: KEYBOARD_ROWS }, () =>
      new Array<number>(KEYBOARD_COLUMNS).fill(RED),
    );

    await new Keyboard(backend).setCustom(grid);

    expect(backend.callsTo("createEffect")).toEqual([["keyboard", "custom", grid]]);
  });

  it("rejects a grid of the wrong size", async () => {
    const backend = new RecordingBackend();
    await expect(new Keyboard(backend).setCustom([[RED]])).rejects.toThrow(
      "Keyboard grid must be 6x22",
    );
    expect(backend.calls).toHaveLength(0);
  });
});

describe("LinkDevice", () => {
  it("writes one position and submits the whole buffer", async () => {
    const backend = new RecordingBackend();
    const link = new LinkDevice(backend);

    await link.set(3, RED);

    expect(backend.callsTo("createEffect")).toEqual([
      ["link", "custom", [BLACK, BLACK, BLACK, RED, BLACK]],
    ]);
    expect(link.get(3)).toBe(RED);
    expect(link.isSet(3)).toBe(true);
    expect(link.isSet(0)).toBe(false);
  });

  it("submits exactly one create per indexed write", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: LINK_DEVICE_POSITIONS - 1 }),
        fc.integer({ min: 1, max: 0xffffff }),
        async (index, color) => {
          const backend = new RecordingBackend();
          const link = new LinkDevice(backend);

          await link.set(index, color);

          const expected = new Array<number>(LINK_DEVICE_POSITIONS).fill(BLACK);
          expected[index] = color;
          expect(backend.callsTo("createEffect")).toEqual([["link", "custom", expected]]);
          expect(link.colors()).toEqual(expected);
        },
      ),
    );
  });

  it("submits a snapshot, not the live buffer", async () => {
    const backend = new RecordingBackend();
    const link = new LinkDevice(backend);

    await link.set(0, RED);
    await link.set(1, RED);

    const [first] = backend.callsTo("createEffect");
    expect(first).toEqual(["link", "custom", [RED, BLACK, BLACK, BLACK, BLACK]]);
  });

  it("rejects positions outside the buffer", async () => {
    const link = new LinkDevice(new RecordingBackend());
    await expect(link.set(5, RED)).rejects.toThrow("Link device position 5 out of range [0, 5)");
    expect(() => link.get(-1)).toThrow(RangeError);
    expect(() => link.get(1.5)).toThrow(RangeError);
  });

  it("setCustom replaces the buffer", async () => {
    const backend = new RecordingBackend();
    const link = new LinkDevice(backend);
    const colors = [1, 2, 3, 4, 5];

    await link.setCustom(colors);

    expect(link.colors()).toEqual(colors);
    expect(backend.callsTo("createEffect")).toEqual([["link", "custom", colors]]);
    await expect(link.setCustom([1, 2])).rejects.toThrow("Link device takes exactly 5 colors");
  });

  it("setAll fills the buffer and applies a static effect", async () => {
    const backend = new RecordingBackend();
    const link = new LinkDevice(backend);

    await link.setAll(RED);

    expect(link.colors()).toEqual([RED, RED, RED, RED, RED]);
    expect(backend.callsTo("createEffect")).toEqual([["link", "static", { color: RED }]]);
  });
});

describe("GenericDevice", () => {
  it("creates effects by device id", async () => {
    const backend = new RecordingBackend();
    const device = new GenericDevice(DEVICE_ID, backend);

    await device.setEffect("wave");
    await device.clear();

    expect(backend.callsTo("createDeviceEffect")).toEqual([
      [DEVICE_ID, "wave", undefined],
      [DEVICE_ID, "none", undefined],
    ]);
  });

  it("does not support setAll", async () => {
    const backend = new RecordingBackend();
    await expect(new GenericDevice(DEVICE_ID, backend).setAll(RED)).rejects.toBeInstanceOf(
      UnsupportedOperationError,
    );
    expect(backend.calls).toHaveLength(0);
  });
});
