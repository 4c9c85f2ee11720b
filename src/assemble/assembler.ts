import { IncompleteCoverageError, InvalidShapeError } from "../core/errors";
import { isDimension } from "../core/shape";
import { createLogger } from "../log";
import { applyPlans, planTile } from "./plan";
import { allocate, Slice } from "./slice";
import type { AssembleOptions, Tile } from "./types";

const log = createLogger("assemble");

function checkShape(shape0: number, shape1: number): number {
  if (!isDimension(shape0) || !isDimension(shape1)) {
    throw new InvalidShapeError(
      `slice shape must be positive integers, got [${shape0}, ${shape1}]`,
    );
  }
  const size = shape0 * shape1;
  if (!Number.isSafeInteger(size)) {
    throw new InvalidShapeError(`slice shape [${shape0}, ${shape1}] is too large`);
  }
  return size;
}

function checkCoverage(written: Uint8Array): void {
  let missing = 0;
  let firstMissing = -1;
  for (let i = 0; i < written.length; i += 1) {
    if (written[i] === 0) {
      if (firstMissing < 0) firstMissing = i;
      missing += 1;
    }
  }
  if (missing > 0) {
    throw new IncompleteCoverageError(missing, firstMissing, written.length);
  }
}

/**
 * Scatter an ordered list of tiles into a fresh, zero-filled row-major
 * `shape0 x shape1` slice.
 *
 * All tiles are planned and bounds checked before the first write; any
 * error leaves nothing behind. Tiles later in the list win where their
 * destination ranges overlap earlier ones.
 */
export function assembleSlice(
  tiles: readonly Tile[],
  shape0: number,
  shape1: number,
  options: AssembleOptions = {},
): Slice {
  const size = checkShape(shape0, shape1);
  const plans = tiles.map((tile, index) => planTile(tile, index, size));

  const out = allocate(size, options.dtype ?? "f64");
  const written = options.requireCoverage ? new Uint8Array(size) : undefined;
  const runs = applyPlans(plans, out, written);
  if (written) {
    checkCoverage(written);
  }

  log.debug(`assembled ${tiles.length} tile(s), ${runs} run(s) into [${shape0}, ${shape1}]`);
  return new Slice([shape0, shape1], out);
}

/**
 * Holds assembly options so callers configured once (the CLI, a client
 * session) can assemble repeatedly without threading them through.
 */
export class TileAssembler {
  private readonly options: AssembleOptions;

  constructor(options: AssembleOptions = {}) {
    this.options = { ...options };
  }

  assemble(tiles: readonly Tile[], shape0: number, shape1: number): Slice {
    return assembleSlice(tiles, shape0, shape1, this.options);
  }
}
