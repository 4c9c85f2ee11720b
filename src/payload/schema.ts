/**
 * Zod schemas for the slice payload returned by the service.
 *
 * These are the input boundary: anything past `parseSlicePayload` is typed
 * and every layout field is known to be a non-negative safe integer.
 */

import { z } from "zod";

import { MalformedLayoutError, MalformedPayloadError } from "../core/errors";
import type { Tile } from "../assemble/types";

const CountSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const LayoutSchema = z.object({
  initial_skip: CountSchema,
  chunk_size: CountSchema,
  iterations: CountSchema,
  substride: CountSchema,
  superstride: CountSchema,
});

export const TileSchema = z.object({
  layout: LayoutSchema,
  v: z.array(z.number()),
});

export const SlicePayloadSchema = z.object({
  tiles: z.array(TileSchema),
});

export type SlicePayload = z.infer<typeof SlicePayloadSchema>;

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map(String).join(".");
}

function toPayloadError(issue: z.ZodIssue | undefined): MalformedPayloadError {
  if (!issue) {
    return new MalformedPayloadError("payload failed validation");
  }
  const [root, tileIndex, key, field] = issue.path;
  if (root === "tiles" && typeof tileIndex === "number" && key === "layout") {
    const name = typeof field === "string" ? field : "";
    const target = name ? `layout.${name}` : "layout";
    return new MalformedLayoutError(`tile ${tileIndex}: ${target}: ${issue.message}`, tileIndex, name);
  }
  const path = formatPath(issue.path);
  return new MalformedPayloadError(`${path || "payload"}: ${issue.message}`, path);
}

export function parseSlicePayload(json: unknown): Tile[] {
  const result = SlicePayloadSchema.safeParse(json);
  if (!result.success) {
    throw toPayloadError(result.error.issues[0]);
  }
  return result.data.tiles;
}

export function parseSlicePayloadText(text: string): Tile[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new MalformedPayloadError(`payload is not valid JSON: ${reason}`);
  }
  return parseSlicePayload(json);
}
