/**
 * Port: SHA-256 over raw bytes.
 *
 * Guarantees:
 * - Deterministic: same bytes -> same 32-byte digest
 * - Pure (no side effects, no retained reference to the input)
 */
export interface Sha256Port {
  sha256(bytes: Uint8Array): Uint8Array;
}
