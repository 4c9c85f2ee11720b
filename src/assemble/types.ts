/**
 * Strided-copy descriptor carried by every tile.
 *
 * Field names match the wire format so a parsed payload needs no renaming.
 */
export type Layout = {
  /** Destination offset of the first run */
  initial_skip: number;
  /** Elements copied per iteration */
  chunk_size: number;
  /** Number of runs */
  iterations: number;
  /** Source advance between runs */
  substride: number;
  /** Destination advance between runs */
  superstride: number;
};

export const LAYOUT_FIELDS = [
  "initial_skip",
  "chunk_size",
  "iterations",
  "substride",
  "superstride",
] as const satisfies ReadonlyArray<keyof Layout>;

export type TileValues = ArrayLike<number>;

export type Tile = {
  layout: Layout;
  v: TileValues;
};

export type DType = "f32" | "f64";

export type SliceData = Float32Array | Float64Array;

/**
 * One contiguous copy: `length` values from `v[src]` to `out[dst]`.
 */
export type CopyRun = {
  src: number;
  dst: number;
  length: number;
};

/**
 * A validated tile whose every run is known to stay in bounds. Runs are
 * not materialised: `runCount` runs start at `(0, layout.initial_skip)` and
 * advance by `(substride, superstride)`.
 */
export type TilePlan = {
  tileIndex: number;
  values: TileValues;
  layout: Layout;
  /** 0 when `iterations` or `chunk_size` is 0 */
  runCount: number;
};

export type AssembleOptions = {
  dtype?: DType;
  /** Fail with IncompleteCoverageError when any element is never written */
  requireCoverage?: boolean;
};
