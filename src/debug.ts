/**
 * Debug-assertion switch for contract checks on `UintN`.
 *
 * Off by default: bit indices, shift amounts and operand shapes are then the
 * caller's responsibility and are not checked. Set `UINT_N_DEBUG=1` (or
 * `true`) in the environment, or call `setDebugAssertions(true)`, to enable.
 */

function readEnvFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  const v = value.trim().toLowerCase();
  return v === '1' || v === 'true';
}

let enabled = readEnvFlag(process.env.UINT_N_DEBUG);

/** Turn contract checks on or off for the whole process. */
export function setDebugAssertions(on: boolean): void {
  enabled = on;
}

export function debugAssertionsEnabled(): boolean {
  return enabled;
}

/**
 * Throw when debug assertions are enabled and `condition` fails.
 * Both arguments are thunks and are not evaluated when assertions are off.
 */
export function debugAssert(condition: () => boolean, message: () => string): void {
  if (enabled && !condition()) {
    throw new Error(`UintN: ${message()}`);
  }
}
