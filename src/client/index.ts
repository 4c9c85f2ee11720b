export {
  type CubeDescription,
  CubeDescriptionSchema,
  CubeListSchema,
  type DimensionDescription,
  type FetchFn,
  joinUrl,
  SliceClient,
  type SliceClientOptions,
  sliceShape,
} from "./slice-client";
export {
  createServiceToken,
  DEFAULT_TOKEN_TTL_SECONDS,
  type ServiceTokenOptions,
  signToken,
  type TokenClaims,
} from "./token";
