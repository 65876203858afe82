export {
  RATCHET_ID_LENGTH,
  RATCHET_EXPIRY_MS,
  MAX_RATCHETS,
  type RatchetExtraction,
  type RatchetRecord,
  generateRatchet,
  ratchetPublicKey,
  ratchetId,
  ratchetEncrypt,
  ratchetDecrypt,
  extractRatchet,
  packRatchetRecord,
  unpackRatchetRecord,
  RatchetRing,
} from './ratchet.js';
