export class InvalidShapeError extends Error {
  name = "InvalidShapeError";
}

/**
 * The payload does not have the `{ tiles: [{ layout, v }] }` structure.
 * `path` is the JSON path of the first offending value.
 */
export class MalformedPayloadError extends Error {
  name = "MalformedPayloadError";
  readonly path: string;

  constructor(message: string, path = "") {
    super(message);
    this.path = path;
  }
}

/**
 * A layout field is missing, non-numeric, fractional or negative.
 */
export class MalformedLayoutError extends MalformedPayloadError {
  name = "MalformedLayoutError";
  readonly tileIndex: number;
  readonly field: string;

  constructor(message: string, tileIndex: number, field: string) {
    super(message, field ? `tiles.${tileIndex}.layout.${field}` : `tiles.${tileIndex}.layout`);
    this.tileIndex = tileIndex;
    this.field = field;
  }
}

export type BoundsSide = "source" | "destination" | "index";

export class OutOfBoundsError extends Error {
  name = "OutOfBoundsError";
  readonly side: BoundsSide;
  readonly start: number;
  readonly end: number;
  readonly limit: number;

  constructor(message: string, side: BoundsSide, start: number, end: number, limit: number) {
    super(message);
    this.side = side;
    this.start = start;
    this.end = end;
    this.limit = limit;
  }
}

export class IncompleteCoverageError extends Error {
  name = "IncompleteCoverageError";
  readonly missing: number;
  readonly firstMissing: number;

  constructor(missing: number, firstMissing: number, size: number) {
    super(
      `${missing} of ${size} slice elements were never written (first at offset ${firstMissing})`,
    );
    this.missing = missing;
    this.firstMissing = firstMissing;
  }
}

export class HttpStatusError extends Error {
  name = "HttpStatusError";
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`GET ${url} failed: ${status} ${statusText}`.trimEnd());
    this.status = status;
    this.url = url;
  }
}

export class ConfigError extends Error {
  name = "ConfigError";
}

export class UsageError extends Error {
  name = "UsageError";
}
