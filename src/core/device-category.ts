/**
 * Device categories and the effect-kind vocabulary each one accepts.
 *
 * @module DeviceCategories
 */

export const DEVICE_CATEGORIES = [
  "keyboard",
  "mouse",
  "mousepad",
  "headset",
  "keypad",
  "link",
  "generic",
] as const;

export type DeviceCategory = (typeof DEVICE_CATEGORIES)[number];

/** Categories with a dedicated endpoint; generic devices are addressed by id instead. */
export type TypedDeviceCategory = Exclude<DeviceCategory, "generic">;

export const EFFECT_KINDS = {
  keyboard: [
    "none",
    "breathing",
    "custom",
    "reactive",
    "static",
    "spectrum_cycling",
    "wave",
    "custom_key",
  ],
  mouse: ["none", "custom", "static", "breathing", "blinking", "reactive", "spectrum_cycling", "wave"],
  mousepad: ["none", "breathing", "custom", "static", "spectrum_cycling", "wave"],
  headset: ["none", "static", "breathing", "spectrum_cycling", "custom"],
  keypad: ["none", "breathing", "custom", "reactive", "static", "spectrum_cycling", "wave"],
  link: ["none", "custom", "static"],
  generic: ["none", "wave", "spectrum_cycling", "breathing", "blinking", "reactive", "static", "custom"],
} as const satisfies Record<DeviceCategory, readonly string[]>;

export type EffectKind<C extends DeviceCategory = DeviceCategory> = (typeof EFFECT_KINDS)[C][number];

/** Control-plane path segment per category. */
export const CATEGORY_PATHS: Record<TypedDeviceCategory, string> = {
  keyboard: "/keyboard",
  mouse: "/mouse",
  mousepad: "/mousepad",
  headset: "/headset",
  keypad: "/keypad",
  link: "/chromalink",
};

export function isDeviceCategory(value: unknown): value is DeviceCategory {
  return typeof value === "string" && (DEVICE_CATEGORIES as readonly string[]).includes(value);
}

export function isEffectKind<C extends DeviceCategory>(
  category: C,
  kind: unknown,
): kind is EffectKind<C> {
  const kinds: readonly string[] = EFFECT_KINDS[category];
  return typeof kind === "string" && kinds.includes(kind);
}

/** `spectrum_cycling` → `CHROMA_SPECTRUM_CYCLING` */
export function effectWireName(kind: string): string {
  return `CHROMA_${kind.toUpperCase()}`;
}
