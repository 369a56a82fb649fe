/** Packed 24-bit color in the SDK's native `0x00BBGGRR` layout. */
export type Color = number;

export const BLACK: Color = 0x000000;
export const WHITE: Color = 0xffffff;

function channel(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`${name} channel must be an integer in [0, 255], got ${value}`);
  }
  return value;
}

export function rgb(r: number, g: number, b: number): Color {
  return channel(r, "red") | (channel(g, "green") << 8) | (channel(b, "blue") << 16);
}

export function colorChannels(color: Color): { r: number; g: number; b: number } {
  return { r: color & 0xff, g: (color >> 8) & 0xff, b: (color >> 16) & 0xff };
}
