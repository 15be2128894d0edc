/**
 * Error codes for layout generation and realization.
 *
 * Everything except CONFIG_INVALID and GENERATION_FAILED is a degradation:
 * it is recorded on the layout as a diagnostic and generation carries on.
 */
export type LayoutErrorCode =
  | "CONFIG_INVALID"
  | "CELL_OCCUPIED"
  | "OUT_OF_BOUNDS"
  | "EXHAUSTED_ATTEMPTS"
  | "INSUFFICIENT_ROOMS"
  | "BOSS_HAS_NO_ADJACENT_ROOM"
  | "REPAIR_IMPOSSIBLE"
  | "MISSING_TILE_ASSET"
  | "GENERATION_FAILED";

/**
 * Unified error type for layout operations.
 *
 * @example
 * ```typescript
 * const error = LayoutError.cellOccupied({ row: 1, col: 1 });
 * error.code; // "CELL_OCCUPIED"
 * ```
 */
export class LayoutError extends Error {
  readonly name = "LayoutError";

  constructor(
    public readonly code: LayoutErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LayoutError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): LayoutError {
    return new LayoutError("CONFIG_INVALID", message, details);
  }

  static cellOccupied(coord: { row: number; col: number }): LayoutError {
    return new LayoutError(
      "CELL_OCCUPIED",
      `Cell [${coord.row},${coord.col}] already holds a room`,
      { row: coord.row, col: coord.col },
    );
  }

  static outOfBounds(
    coord: { row: number; col: number },
    rows: number,
    cols: number,
  ): LayoutError {
    return new LayoutError(
      "OUT_OF_BOUNDS",
      `Cell [${coord.row},${coord.col}] is outside the ${rows}x${cols} grid`,
      { row: coord.row, col: coord.col, rows, cols },
    );
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): LayoutError {
    return new LayoutError("GENERATION_FAILED", message, details);
  }

  static isLayoutError(error: unknown): error is LayoutError {
    return error instanceof LayoutError;
  }

  toJSON(): {
    name: string;
    code: LayoutErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
