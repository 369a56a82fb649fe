/**
 * Result codes reported by the lighting SDK, both by the native binding and
 * in the `result` field of control-plane responses.
 */

export type ResultCode = number;

export const RESULT_CODES = {
  success: 0,
  accessDenied: 5,
  invalidAccess: 12,
  notSupported: 50,
  invalidParameter: 87,
  noMoreItems: 259,
  singleInstanceApp: 1152,
  resourceDisabled: 4309,
  deviceNotAvailable: 4319,
  notValidState: 5023,
  failed: -2147467259,
} as const satisfies Record<string, ResultCode>;

export type ResultCodeName = keyof typeof RESULT_CODES;

const NAMES_BY_CODE = new Map<ResultCode, string>(
  Object.entries(RESULT_CODES).map(([name, code]): [ResultCode, string] => [code, name]),
);

export function isSuccess(code: ResultCode): boolean {
  return code === RESULT_CODES.success;
}

/** Human-readable name for log lines, e.g. `notSupported (50)`. */
export function describeResultCode(code: ResultCode): string {
  const name = NAMES_BY_CODE.get(code);
  return name ? `${name} (${code})` : `unknown (${code})`;
}
