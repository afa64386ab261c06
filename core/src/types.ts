/**
 * Shared type helpers
 */

/**
 * Exhaustiveness check for switch statements over discriminated unions.
 *
 * @example
 * ```typescript
 * switch (matrix.format) {
 *   case 'coo': return writeCoo(matrix, type, npz);
 *   // ...
 *   default: return assertNever(matrix, 'Unhandled sparse format');
 * }
 * ```
 *
 * If a new member is added to the union, the call stops compiling because
 * the value is no longer assignable to `never`.
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${String(value)}`);
}

/**
 * Product of a list of dimension sizes (1 for the empty list).
 */
export function product(dims: readonly number[]): number {
  return dims.reduce((acc, d) => acc * d, 1);
}
