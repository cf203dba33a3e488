/**
 * @fileoverview Jest test setup
 *
 * Loads reflect-metadata before any decorated test class and registers the
 * custom matchers.
 */

import 'reflect-metadata';

export {};

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    interface Matchers<R, T> {
      /**
       * Check if the function throws an error of a specific class
       * @param expected Error constructor
       */
      toThrowErrorType(expected: abstract new (...args: never[]) => Error): R;
    }
  }
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

expect.extend({
  /**
   * Check if thrown error is of specific type
   */
  toThrowErrorType(received: () => unknown, expected: abstract new (...args: never[]) => Error) {
    try {
      received();
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    } catch (error) {
      const pass = error instanceof expected;
      return {
        pass,
        message: () =>
          pass
            ? `Expected function not to throw ${expected.name}`
            : `Expected function to throw ${expected.name}, but it threw ${
                error instanceof Error ? error.constructor.name : typeof error
              }`,
      };
    }
  },
});
