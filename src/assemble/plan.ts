import { MalformedLayoutError, OutOfBoundsError } from "../core/errors";
import { LAYOUT_FIELDS, type CopyRun, type Layout, type SliceData, type Tile, type TilePlan } from "./types";

/**
 * Check that every layout field is a non-negative safe integer.
 *
 * Callers outside the payload codec may hand in objects built by hand, so
 * this does not trust the static type.
 */
export function validateLayout(layout: Layout | undefined, tileIndex: number): Layout {
  if (layout === undefined || layout === null || typeof layout !== "object") {
    throw new MalformedLayoutError(`tile ${tileIndex} has no layout`, tileIndex, "");
  }
  for (const field of LAYOUT_FIELDS) {
    const value: unknown = layout[field];
    if (typeof value !== "number" || !Number.isSafeInteger(value)) {
      throw new MalformedLayoutError(
        `tile ${tileIndex}: layout.${field} must be an integer, got ${String(value)}`,
        tileIndex,
        field,
      );
    }
    if (value < 0) {
      throw new MalformedLayoutError(
        `tile ${tileIndex}: layout.${field} must be >= 0, got ${value}`,
        tileIndex,
        field,
      );
    }
  }
  return layout;
}

/**
 * First run index whose range `[start + i * stride, ... + length)` passes
 * `limit`, or -1. Offsets never decrease, so only the first and last runs
 * need looking at.
 */
function firstOverflow(
  start: number,
  stride: number,
  length: number,
  limit: number,
  count: number,
): number {
  if (start + length > limit) return 0;
  if (stride === 0) return -1;
  if (start + (count - 1) * stride + length <= limit) return -1;
  return Math.floor((limit - length - start) / stride) + 1;
}

/**
 * Validate a tile and bounds check every run it describes, before anything
 * is written. Checking is O(1) in `iterations`.
 *
 * `iterations = 0` or `chunk_size = 0` yields an empty plan regardless of
 * the remaining fields.
 */
export function planTile(tile: Tile, tileIndex: number, size: number): TilePlan {
  const layout = validateLayout(tile.layout, tileIndex);
  const values = tile.v;
  const length = layout.chunk_size;
  if (layout.iterations === 0 || length === 0) {
    return { tileIndex, values, layout, runCount: 0 };
  }

  const count = layout.iterations;
  const dstFail = firstOverflow(layout.initial_skip, layout.superstride, length, size, count);
  const srcFail = firstOverflow(0, layout.substride, length, values.length, count);
  if (dstFail >= 0 && (srcFail < 0 || dstFail <= srcFail)) {
    const dst = layout.initial_skip + dstFail * layout.superstride;
    throw new OutOfBoundsError(
      `tile ${tileIndex} iteration ${dstFail}: destination range [${dst}, ${dst + length}) exceeds slice size ${size}`,
      "destination",
      dst,
      dst + length,
      size,
    );
  }
  if (srcFail >= 0) {
    const src = srcFail * layout.substride;
    throw new OutOfBoundsError(
      `tile ${tileIndex} iteration ${srcFail}: source range [${src}, ${src + length}) exceeds ${values.length} tile values`,
      "source",
      src,
      src + length,
      values.length,
    );
  }
  return { tileIndex, values, layout, runCount: count };
}

/**
 * The copy runs a plan describes, in execution order.
 */
export function* planRuns(plan: TilePlan): Generator<CopyRun> {
  const { chunk_size: length, substride, superstride, initial_skip } = plan.layout;
  for (let run = 0; run < plan.runCount; run += 1) {
    yield { src: run * substride, dst: initial_skip + run * superstride, length };
  }
}

/**
 * Execute plans strictly in input order against one destination buffer.
 *
 * This is the only writer: a later plan overwrites what an earlier one put
 * at the same offset, which is how overlapping tiles are resolved. When
 * `written` is given, every touched offset is marked with 1.
 *
 * With `superstride = 0` every run lands on the same range, so only the
 * last one is copied.
 *
 * Returns the number of runs the plans describe.
 */
export function applyPlans(
  plans: readonly TilePlan[],
  out: SliceData,
  written?: Uint8Array,
): number {
  let executed = 0;
  for (const plan of plans) {
    const values = plan.values;
    const { chunk_size: length, substride, superstride } = plan.layout;
    const first = superstride === 0 ? Math.max(plan.runCount - 1, 0) : 0;
    let src = first * substride;
    let dst = plan.layout.initial_skip + first * superstride;
    for (let run = first; run < plan.runCount; run += 1) {
      for (let k = 0; k < length; k += 1) {
        out[dst + k] = values[src + k];
      }
      written?.fill(1, dst, dst + length);
      src += substride;
      dst += superstride;
    }
    executed += plan.runCount;
  }
  return executed;
}
