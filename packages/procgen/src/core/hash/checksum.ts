/**
 * Layout Checksum
 *
 * Deterministic fingerprint of a room layout, used to check that a seed
 * reproduces the same layout.
 *
 * ## Versioning
 *
 * Checksums are prefixed with the algorithm version: "v{version}:{hash}".
 * Bump the version whenever the hashed fields or their order change.
 *
 * Version history:
 * - v1: grid size, then per room (row-major) coordinate, category and exits
 */

import { DIRECTIONS } from "../geometry/types";
import type { Room } from "../../rooms/room";
import { createFNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

/**
 * Split a versioned checksum. Returns null when it carries no version.
 */
export function parseChecksum(checksum: string): {
  version: number;
  hash: string;
} | null {
  const match = checksum.match(/^v(\d+):(.+)$/);
  if (!match || !match[1] || !match[2]) return null;
  return {
    version: parseInt(match[1], 10),
    hash: match[2],
  };
}

/**
 * @param rooms - occupied rooms in row-major order
 * @returns Versioned checksum string (format: "v{version}:{hash}")
 */
export function calculateLayoutChecksum(
  rows: number,
  cols: number,
  rooms: readonly Room[],
): string {
  const hasher = createFNV64Hasher();

  hasher.updateInt32(CHECKSUM_VERSION);
  hasher.updateInt32(rows);
  hasher.updateInt32(cols);

  for (const room of rooms) {
    hasher.updateInt32(room.coordinate.row);
    hasher.updateInt32(room.coordinate.col);
    hasher.updateString(room.category);
    for (const direction of DIRECTIONS) {
      hasher.updateBoolean(room.hasExit(direction));
    }
  }

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
