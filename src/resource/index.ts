export {
  MAPHASH_LEN,
  RANDOM_HASH_SIZE,
  mapHash,
  buildHashmap,
  findPart,
  hashmapCollisions,
  resourceHash,
  resourceProof,
  RESOURCE_PROOF_PAYLOAD_LENGTH,
  validateResourceProof,
} from './hashmap.js';

export {
  ADVERTISEMENT_OVERHEAD,
  HASHMAP_MAX_LEN,
  type ResourceFlags,
  type ResourceAdvertisement,
  encodeResourceFlags,
  decodeResourceFlags,
  hashmapSegmentCount,
  hashmapSegment,
  packAdvertisement,
  unpackAdvertisement,
} from './advertisement.js';

export {
  WINDOW,
  MAX_EFFICIENT_SIZE,
  SDU,
  METADATA_MAX_SIZE,
  ResourceStatus,
  type ResourceOptions,
  type OutgoingResource,
  type AssemblerOptions,
  createResource,
  validateProof,
  ResourceAssembler,
} from './resource.js';
