import { SeededRandom } from "./seeded-random";

let fallbackCounter = 0;

function fallbackUint32(): number {
  fallbackCounter = (fallbackCounter + 0x9e3779b9) >>> 0;
  const rng = new SeededRandom((Date.now() ^ fallbackCounter) >>> 0);
  return Math.floor(rng.next() * 0x100000000) >>> 0;
}

/**
 * Unsigned 32-bit value from Web Crypto, used to pick a seed when the
 * caller did not supply one. Falls back to a time-mixed PRNG draw.
 */
export function randomUint32(): number {
  const webCrypto = globalThis.crypto;
  if (webCrypto && typeof webCrypto.getRandomValues === "function") {
    const buffer = new Uint32Array(1);
    webCrypto.getRandomValues(buffer);
    const value = buffer[0];
    if (value !== undefined) return value >>> 0;
  }
  return fallbackUint32();
}
