import { EffectId } from "../core/effect-id.js";
import type { AppInfo } from "../types/app-info.js";

export function makeAppInfo(overrides?: Partial<AppInfo>): AppInfo {
  return {
    title: "Test App",
    description: "Lighting test application",
    author: { name: "Test Author", contact: "test@example.com" },
    supportedDevices: ["keyboard", "mouse"],
    category: "application",
    ...overrides,
  };
}

/** Deterministic effect id: `effectIdFor(1)` is `00000000-0000-0000-0000-000000000001`. */
export function effectIdFor(n: number): EffectId {
  return EffectId.parse(`00000000-0000-0000-0000-${n.toString(16).padStart(12, "0")}`);
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending I/O and promise callbacks run. Real timers only. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
