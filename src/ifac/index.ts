export {
  IFAC_SALT,
  IFAC_KEY_LENGTH,
  type IfacUnmaskResult,
  ifacOrigin,
  deriveIfacKey,
  computeIfac,
  verifyIfac,
  applyIfac,
  removeIfac,
} from './ifac.js';
