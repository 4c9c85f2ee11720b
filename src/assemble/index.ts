export { assembleSlice, TileAssembler } from "./assembler";
export { applyPlans, planRuns, planTile, validateLayout } from "./plan";
export { allocate, Slice } from "./slice";
export {
  type AssembleOptions,
  type CopyRun,
  type DType,
  LAYOUT_FIELDS,
  type Layout,
  type SliceData,
  type Tile,
  type TilePlan,
  type TileValues,
} from "./types";
