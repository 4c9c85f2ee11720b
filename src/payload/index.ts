export {
  LayoutSchema,
  parseSlicePayload,
  parseSlicePayloadText,
  type SlicePayload,
  SlicePayloadSchema,
  TileSchema,
} from "./schema";
