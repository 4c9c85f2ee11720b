/**
 * HTTP client for the slice query service.
 *
 * Endpoints:
 *   GET {base}/                          cube listing ({ links })
 *   GET {base}/{guid}                    cube description ({ functions, dimensions, pid })
 *   GET {base}/{guid}/slice/{dim}/{line} slice tiles ({ tiles })
 *
 * No retries: a failed request surfaces as HttpStatusError.
 */

import { z } from "zod";

import type { Tile } from "../assemble/types";
import { HttpStatusError, InvalidShapeError, MalformedPayloadError } from "../core/errors";
import type { Shape2D } from "../core/shape";
import { createLogger } from "../log";
import { parseSlicePayload } from "../payload/schema";

const log = createLogger("client");

export type FetchFn = typeof fetch;

export type SliceClientOptions = {
  baseUrl: string;
  /** Bearer token sent with every request */
  token?: string;
  fetch?: FetchFn;
};

export const CubeListSchema = z.object({
  links: z.record(z.string()),
});

export const DimensionDescriptionSchema = z.object({
  dimension: z.number().int().nonnegative(),
  size: z.number().int().nonnegative(),
  keys: z.array(z.number()),
});

export const CubeDescriptionSchema = z.object({
  functions: z.record(z.string()),
  dimensions: z.array(DimensionDescriptionSchema),
  pid: z.string().optional(),
});

export type DimensionDescription = z.infer<typeof DimensionDescriptionSchema>;
export type CubeDescription = z.infer<typeof CubeDescriptionSchema>;

/**
 * A slice through `dim` spans the remaining dimensions, in order.
 */
export function sliceShape(description: CubeDescription, dim: number): Shape2D {
  const dims = description.dimensions;
  if (!Number.isInteger(dim) || dim < 0 || dim >= dims.length) {
    throw new InvalidShapeError(`dimension ${dim} not in [0, ${dims.length})`);
  }
  const rest = dims.filter((_, i) => i !== dim).map((d) => d.size);
  if (rest.length !== 2) {
    throw new InvalidShapeError(
      `slicing a ${dims.length}-dimensional cube does not give a 2D slice`,
    );
  }
  return [rest[0], rest[1]];
}

export function joinUrl(baseUrl: string, ...segments: Array<string | number>): string {
  const base = baseUrl.replace(/\/+$/, "");
  if (segments.length === 0) {
    return `${base}/`;
  }
  return [base, ...segments.map((s) => encodeURIComponent(String(s)))].join("/");
}

export class SliceClient {
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly fetchFn: FetchFn;

  constructor(options: SliceClientOptions) {
    this.baseUrl = options.baseUrl;
    this.token = options.token;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async listCubes(): Promise<Record<string, string>> {
    const json = await this.get(joinUrl(this.baseUrl));
    return parseWith(CubeListSchema, json, "cube listing").links;
  }

  async describeCube(guid: string): Promise<CubeDescription> {
    const json = await this.get(joinUrl(this.baseUrl, guid));
    return parseWith(CubeDescriptionSchema, json, "cube description");
  }

  async fetchSlicePayload(guid: string, dim: number, lineno: number): Promise<unknown> {
    return this.get(joinUrl(this.baseUrl, guid, "slice", dim, lineno));
  }

  async fetchSlice(guid: string, dim: number, lineno: number): Promise<Tile[]> {
    const tiles = parseSlicePayload(await this.fetchSlicePayload(guid, dim, lineno));
    log.debug(`slice ${guid}/${dim}/${lineno}: ${tiles.length} tile(s)`);
    return tiles;
  }

  private async get(url: string): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    log.debug(`GET ${url}`);
    const response = await this.fetchFn(url, { method: "GET", headers });
    if (!response.ok) {
      log.warn(`GET ${url} -> ${response.status}`);
      throw new HttpStatusError(response.status, response.statusText, url);
    }
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new MalformedPayloadError(`response from ${url} is not valid JSON: ${reason}`);
    }
  }
}

function parseWith<T>(schema: z.ZodType<T>, json: unknown, what: string): T {
  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join(".") : "";
    const reason = issue ? issue.message : "failed validation";
    throw new MalformedPayloadError(`${what}: ${path || "body"}: ${reason}`, path);
  }
  return result.data;
}
