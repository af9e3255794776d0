/**
 * Exhaustiveness check for `switch` over a closed union: adding a member
 * without handling it is a compile error here.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled union member: ${JSON.stringify(value)}`);
}
