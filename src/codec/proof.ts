import { invalid, type VerificationResult } from '../errors.js';
import { SIGNATURE_SIZE } from '../crypto/keys.js';
import { concatBytes, constantTimeEqual } from '../crypto/utils.js';
import type { Identity } from '../identity/identity.js';
import { createPacket, fullPacketHash, packPacket, packetHash } from './packet.js';
import { DESTINATION_HASH_LENGTH, DestinationType, PacketType } from './types.js';

/**
 * packet hash (16) + signature (64)
 */
export const EXPLICIT_PROOF_LENGTH = DESTINATION_HASH_LENGTH + SIGNATURE_SIZE;

/**
 * signature (64) only
 */
export const IMPLICIT_PROOF_LENGTH = SIGNATURE_SIZE;

/**
 * Sign the full hash of a received packet to prove delivery
 */
export function provePacket(
  identity: Identity,
  raw: Uint8Array,
  options: { explicit?: boolean } = {}
): Uint8Array {
  const signature = identity.sign(fullPacketHash(raw));
  return (options.explicit ?? true) ? concatBytes(packetHash(raw), signature) : signature;
}

/**
 * Check an explicit or implicit delivery proof for a packet we sent
 */
export function validatePacketProof(
  identity: Identity,
  raw: Uint8Array,
  proof: Uint8Array
): VerificationResult {
  let signature: Uint8Array;
  if (proof.length === EXPLICIT_PROOF_LENGTH) {
    if (!constantTimeEqual(proof.subarray(0, DESTINATION_HASH_LENGTH), packetHash(raw))) {
      return invalid('Proof refers to a different packet');
    }
    signature = proof.subarray(DESTINATION_HASH_LENGTH);
  } else if (proof.length === IMPLICIT_PROOF_LENGTH) {
    signature = proof;
  } else {
    return invalid(`Invalid proof length: ${proof.length}`);
  }

  return identity.validate(signature, fullPacketHash(raw))
    ? { valid: true }
    : invalid('Invalid proof signature');
}

/**
 * Frame a proof as a PROOF packet addressed to the proven packet's hash
 */
export function packProofPacket(raw: Uint8Array, proof: Uint8Array): Uint8Array {
  return packPacket(
    createPacket({
      destinationType: DestinationType.SINGLE,
      packetType: PacketType.PROOF,
      destinationHash: packetHash(raw),
      data: proof,
    })
  );
}
