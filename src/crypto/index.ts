export {
  secureRandomBytes,
  concatBytes,
  hexToBytes,
  bytesToHex,
  utf8,
  constantTimeEqual,
  isAllZero,
  uintToBytesBE,
  bytesToUintBE,
} from './utils.js';

export {
  AES_BLOCK_SIZE,
  HASH_LENGTH,
  TRUNCATED_HASH_LENGTH,
  sha256,
  sha512,
  fullHash,
  truncatedHash,
  hmacSha256,
  hkdf,
  pkcs7Pad,
  pkcs7Unpad,
  aesCbcEncrypt,
  aesCbcDecrypt,
} from './primitives.js';

export {
  KEY_SIZE,
  SIGNATURE_SIZE,
  type KeyPair,
  generateX25519KeyPair,
  generateEd25519KeyPair,
  deriveX25519PublicKey,
  deriveEd25519PublicKey,
  exchange,
  sign,
  verify,
} from './keys.js';

export {
  TOKEN_IV_SIZE,
  TOKEN_HMAC_SIZE,
  TOKEN_OVERHEAD,
  type TokenKeys,
  Token,
  splitTokenKey,
  encryptToken,
  decryptToken,
  verifyTokenHmac,
} from './token.js';
