/**
 * Nominal marker for values that passed a boundary check (e.g. a zod-parsed
 * config). Erased at runtime.
 *
 * String-keyed so exported types that mention it stay nameable in .d.ts output.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
