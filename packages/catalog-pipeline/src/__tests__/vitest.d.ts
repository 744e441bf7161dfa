/**
 * Custom Vitest matcher declarations, registered in setup.ts
 */

import 'vitest';

interface CustomMatchers<R = unknown> {
  /**
   * Checks if value is one of the expected values in the array.
   */
  toBeOneOf<T>(expected: readonly T[]): R;
}

declare module 'vitest' {
  // Type parameter default must match vitest's own declaration for merging
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  interface Assertion<T = any> extends CustomMatchers<T> {}
  interface AsymmetricMatchersContaining extends CustomMatchers {}
}
