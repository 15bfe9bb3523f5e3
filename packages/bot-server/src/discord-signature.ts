import { createPublicKey, verify, type KeyObject } from "node:crypto";

// DER prefix of an Ed25519 SubjectPublicKeyInfo; the raw 32-byte key follows.
const ED25519_SPKI_PREFIX = Buffer.from("302a300506032b6570032100", "hex");

export function createDiscordPublicKey(hexKey: string): KeyObject {
  if (!/^[0-9a-fA-F]{64}$/.test(hexKey)) {
    throw new Error("discord public key must be 64 hex characters");
  }
  return createPublicKey({
    key: Buffer.concat([ED25519_SPKI_PREFIX, Buffer.from(hexKey, "hex")]),
    format: "der",
    type: "spki"
  });
}

export function verifyDiscordSignature(input: {
  publicKey: KeyObject;
  timestamp: string;
  body: string;
  signature: string;
}): boolean {
  if (!/^[0-9a-fA-F]{128}$/.test(input.signature)) {
    return false;
  }
  return verify(
    null,
    Buffer.from(input.timestamp + input.body, "utf8"),
    input.publicKey,
    Buffer.from(input.signature, "hex")
  );
}
