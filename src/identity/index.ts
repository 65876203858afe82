export {
  PUBLIC_KEY_SIZE,
  DERIVED_KEY_LENGTH,
  type EncryptOptions,
  type DecryptOptions,
  Identity,
  identityHashFromPublicKey,
  encryptForPublicKey,
  decryptWithPrivateKey,
  derivePublicKey,
} from './identity.js';

export {
  type Destination,
  expandName,
  computeNameHash,
  computeDestinationHash,
  createDestination,
} from './destination.js';
