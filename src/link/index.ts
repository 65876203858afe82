export {
  ECPUBSIZE,
  LINK_MTU_SIZE,
  MTU_BYTEMASK,
  MODE_BYTEMASK,
  LinkMode,
  ENABLED_MODES,
  DEFAULT_LINK_MODE,
  type Signalling,
  type LinkKeys,
  type LinkRequestData,
  type LinkProofData,
  assertSupportedMode,
  derivedKeyLength,
  linkMdu,
  encodeSignalling,
  parseSignalling,
  linkIdFromPacket,
  deriveLinkKey,
  linkProofSignedData,
  proveLink,
  verifyLinkProof,
  packLinkRequestData,
  parseLinkRequestData,
  packLinkProofData,
  parseLinkProofData,
} from './handshake.js';

export {
  type LinkRequest,
  type LinkResponse,
  requestPathHash,
  packRtt,
  unpackRtt,
  packLinkRequest,
  unpackLinkRequest,
  packLinkResponse,
  unpackLinkResponse,
} from './messages.js';

export { LinkStatus, type LinkOptions, type LinkMessage, Link } from './link.js';
