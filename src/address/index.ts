export type {
  AddressClassification,
  AddressEncoding,
  AddressType,
  Base58Payload,
  Bech32Decoded,
  DecodedAddress,
  InvalidAddress,
  InvalidReason,
  Network,
  SegwitProgram,
  ValidAddressKind,
} from './address-type.js';
export { ADDRESS_KIND_LABELS, isValidAddress } from './address-type.js';

export type {
  Base58AddressError,
  Base58CheckError,
  Base58ChecksumError,
  Base58DecodeError,
  Base58PayloadError,
  Bech32DecodeError,
  DecodeError,
  DecodeErrorCode,
  SegwitAddressError,
  SegwitProgramError,
} from './decode-error.js';

export { decodeBase58 } from './encoding/base58.js';
export {
  addressFromBase58Payload,
  base58CheckChecksum,
  decodeBase58Check,
  validateBase58Check,
  verifyBase58Check,
} from './base58check.js';
export { decodeBech32, encodeBech32 } from './encoding/bech32.js';
export type { Bech32Variant } from './encoding/bech32-checksum.js';
export { bech32Polymod, createChecksum, expandPrefix, verifyChecksum } from './encoding/bech32-checksum.js';
export { bytesToFiveBit, extractSegwitProgram, fiveBitToBytes } from './segwit-program.js';
export type { ClassifyDeps, SegwitAddress } from './classify.js';
export { classifyAddress, decodeSegwitAddress, networkForPrefix, variantForWitnessVersion } from './classify.js';
