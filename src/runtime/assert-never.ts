/**
 * Compile-time exhaustiveness check for discriminated unions.
 * Reaching this at runtime means a union member was added without a matching branch.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
