import * as ed from "@noble/ed25519";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

export async function signHex(hashHex: string, privateKeyHex: string): Promise<string> {
  const signature = await ed.signAsync(hexToBytes(hashHex), hexToBytes(privateKeyHex));
  return bytesToHex(signature);
}

export async function publicKeyFromPrivateKeyHex(privateKeyHex: string): Promise<string> {
  return bytesToHex(await ed.getPublicKeyAsync(hexToBytes(privateKeyHex)));
}

// Malformed hex in any argument is a failed verification, not an exception.
export async function verifyHex(
  hashHex: string,
  signatureHex: string,
  publicKeyHex: string,
): Promise<boolean> {
  let message: Uint8Array;
  let signature: Uint8Array;
  let publicKey: Uint8Array;
  try {
    message = hexToBytes(hashHex);
    signature = hexToBytes(signatureHex);
    publicKey = hexToBytes(publicKeyHex);
  } catch {
    return false;
  }
  if (signature.length !== 64 || publicKey.length !== 32) return false;
  return ed.verifyAsync(signature, message, publicKey);
}
