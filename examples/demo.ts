#!/usr/bin/env npx tsx
/**
 * Mesh wire demo
 *
 * Walks two sessions through an announce, a ratcheted packet, a delivery
 * proof, a link handshake and a resource transfer over that link.
 * Everything stays in memory; packets are handed across directly.
 *
 * Run with: npm run demo
 */

import {
  Session,
  ResourceAssembler,
  bytesToHex,
  createResource,
  packAdvertisement,
  unpackAdvertisement,
  utf8,
  validateProof,
} from '../src/index.js';

// Demo identity records (DO NOT use these outside the demo!)
const ALICE_PRIVATE_KEY = 'aa'.repeat(64);
const BOB_PRIVATE_KEY = 'bb'.repeat(64);

const decoder = new TextDecoder();

async function main() {
  console.log('\n╔══════════════════════════════════════════════════════════════╗');
  console.log('║                 Mesh Secure Transport Demo                   ║');
  console.log('╚══════════════════════════════════════════════════════════════╝\n');

  const ifac = { netname: 'demonet', netkey: 'demo-secret' };
  const alice = new Session({ privateKey: ALICE_PRIVATE_KEY, ifac });
  const bob = new Session({ privateKey: BOB_PRIVATE_KEY, ifac });

  const inbox = bob.registerDestination('meshdemo', ['inbox']);
  console.log('Sessions initialized:');
  console.log(`   Alice identity: ${alice.identity.hexHash}`);
  console.log(`   Bob identity:   ${bob.identity.hexHash}`);
  console.log(`   Bob inbox:      ${inbox.hexHash} (${inbox.name})`);
  console.log();

  console.log('Step 1: Bob announces his inbox');
  console.log('-'.repeat(40));
  const receipt = await alice.receiveAnnounce(bob.announce(inbox, { appData: utf8('Bob') }));
  if (!receipt.valid) {
    throw new Error(`Announce rejected: ${receipt.reason}`);
  }
  console.log(`Alice: learned ${receipt.destinationHash} ("${decoder.decode(receipt.appData)}")`);
  console.log(`Alice: stored ratchet ${receipt.ratchetId}`);

  console.log('\nStep 2: Alice sends a ratcheted packet');
  console.log('-'.repeat(40));
  const packet = await alice.encryptTo(inbox.hexHash, utf8('Hello Bob! This is a secret message.'));
  console.log(`Alice: sent ${packet.length}-byte packet`);
  const received = bob.decrypt(packet);
  console.log(`Bob: decrypted "${decoder.decode(received?.plaintext)}"`);

  const proof = bob.prove(packet);
  console.log(`Alice: delivery proof ${alice.validateProof(packet, proof).valid ? 'valid' : 'INVALID'}`);

  console.log('\nStep 3: Alice opens a link');
  console.log('-'.repeat(40));
  const opened = alice.openLink(inbox.hexHash);
  const accepted = bob.acceptLink(opened.packet);
  const { result, rttPacket } = alice.completeLink(accepted.packet);
  if (!result.valid || !rttPacket) {
    throw new Error(`Link proof rejected: ${result.valid ? 'no RTT packet' : result.reason}`);
  }
  bob.receiveOverLink(rttPacket);
  console.log(`Link ${opened.link.hexId} active on both sides (mdu ${opened.link.mdu})`);

  const reply = alice.receiveOverLink(bob.sendOverLink(accepted.link.hexId, utf8('Hi Alice, link is up.')));
  console.log(`Alice: received "${decoder.decode(reply?.plaintext)}" over the link`);

  console.log('\nStep 4: Bob sends a resource over the link');
  console.log('-'.repeat(40));
  const document = utf8('This document is larger than a single packet and travels as parts. '.repeat(40));
  const resource = createResource(document, { encrypt: (data) => accepted.link.encrypt(data) });
  console.log(`Bob: ${document.length} bytes in ${resource.parts.length} parts, hash ${bytesToHex(resource.hash)}`);

  const assembler = new ResourceAssembler(unpackAdvertisement(packAdvertisement(resource.advertisement)), {
    decrypt: (data) => opened.link.decrypt(data),
  });
  for (const part of [...resource.parts].reverse()) {
    assembler.receivePart(part);
  }
  const assembled = assembler.assemble();
  console.log(`Alice: reassembled ${assembled.length} bytes, content matches: ${decoder.decode(assembled) === decoder.decode(document)}`);
  console.log(`Bob: completion proof ${validateProof(resource, assembler.proof()).valid ? 'valid' : 'INVALID'}`);

  const closePacket = alice.closeLink(opened.link.hexId);
  if (closePacket) {
    bob.receiveOverLink(closePacket);
  }
  console.log('\nLink closed. Demo completed successfully!\n');

  await alice.close();
  await bob.close();
}

main().catch(console.error);
