/**
 * BFS Distance Calculation
 *
 * Hop distances from a source node over any neighbour relation.
 */

export interface BFSDistanceResult<TNodeId> {
  /** Map from node ID to distance from source */
  readonly distances: Map<TNodeId, number>;
  /** Largest distance reached */
  readonly maxDistance: number;
}

/**
 * Calculate distances from a source node using BFS.
 *
 * Nodes missing from the result were not reachable. Neighbours are
 * visited in the order `getNeighbors` returns them.
 *
 * @example
 * ```typescript
 * const { distances } = calculateBFSDistances(
 *   coordKey(start.coordinate),
 *   (key) => openNeighbours.get(key) ?? [],
 * );
 * ```
 */
export function calculateBFSDistances<TNodeId>(
  sourceId: TNodeId,
  getNeighbors: (nodeId: TNodeId) => readonly TNodeId[],
): BFSDistanceResult<TNodeId> {
  const distances = new Map<TNodeId, number>([[sourceId, 0]]);
  const queue: TNodeId[] = [sourceId];
  let queueHead = 0;
  let maxDistance = 0;

  while (queueHead < queue.length) {
    const current = queue[queueHead++];
    if (current === undefined) break;
    const currentDist = distances.get(current) ?? 0;

    for (const neighbor of getNeighbors(current)) {
      if (distances.has(neighbor)) continue;
      const nextDistance = currentDist + 1;
      distances.set(neighbor, nextDistance);
      if (nextDistance > maxDistance) {
        maxDistance = nextDistance;
      }
      queue.push(neighbor);
    }
  }

  return { distances, maxDistance };
}
