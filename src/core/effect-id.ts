const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const NONE_VALUE = "00000000-0000-0000-0000-000000000000";

/**
 * Opaque 128-bit identifier of an effect instance created by a backend.
 *
 * Backends build these from their responses; devices only copy and compare
 * them. `EffectId.NONE` stands for "no effect active".
 */
export class EffectId {
  static readonly NONE = new EffectId(NONE_VALUE);

  private constructor(private readonly value: string) {}

  /** Parse a UUID string (any case). Throws `TypeError` for anything else. */
  static parse(input: string): EffectId {
    const id = EffectId.tryParse(input);
    if (!id) throw new TypeError(`Invalid effect id: ${JSON.stringify(input)}`);
    return id;
  }

  static tryParse(input: unknown): EffectId | null {
    if (typeof input !== "string") return null;
    const trimmed = input.trim();
    if (!UUID_PATTERN.test(trimmed)) return null;
    const normalized = trimmed.toLowerCase();
    return normalized === NONE_VALUE ? EffectId.NONE : new EffectId(normalized);
  }

  get isNone(): boolean {
    return this.value === NONE_VALUE;
  }

  equals(other: EffectId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
