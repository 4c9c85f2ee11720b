import { computeStrides, isDimension, sizeOf, type Shape2D } from "../core/shape";
import { InvalidShapeError, OutOfBoundsError } from "../core/errors";
import type { DType, SliceData } from "./types";

export function allocate(size: number, dtype: DType): SliceData {
  return dtype === "f64" ? new Float64Array(size) : new Float32Array(size);
}

/**
 * Dense row-major matrix produced by one assembly pass.
 *
 * A Slice owns its buffer: nothing else holds a reference to `data` once the
 * assembler returns it, and no method here writes to it.
 */
export class Slice {
  readonly shape: Shape2D;
  readonly strides: number[];
  readonly data: SliceData;

  constructor(shape: Shape2D, data: SliceData) {
    const [rows, cols] = shape;
    if (!isDimension(rows) || !isDimension(cols)) {
      throw new InvalidShapeError(`Slice shape must be positive integers, got [${shape}]`);
    }
    if (sizeOf(shape) !== data.length) {
      throw new InvalidShapeError("Slice data length does not match shape");
    }
    this.shape = [rows, cols];
    this.strides = computeStrides(shape);
    this.data = data;
  }

  get rows(): number {
    return this.shape[0];
  }

  get cols(): number {
    return this.shape[1];
  }

  get size(): number {
    return this.data.length;
  }

  get dtype(): DType {
    return this.data instanceof Float64Array ? "f64" : "f32";
  }

  at(i: number, j: number): number {
    checkIndex(i, this.rows, "row");
    checkIndex(j, this.cols, "column");
    return this.data[i * this.strides[0] + j];
  }

  row(i: number): number[] {
    checkIndex(i, this.rows, "row");
    const start = i * this.strides[0];
    return Array.from(this.data.subarray(start, start + this.cols));
  }

  toArray(): number[][] {
    const out = new Array<number[]>(this.rows);
    for (let i = 0; i < this.rows; i += 1) {
      out[i] = this.row(i);
    }
    return out;
  }

  toFlatArray(): number[] {
    return Array.from(this.data);
  }

  /**
   * Materialized transpose: a new Slice of shape [cols, rows].
   */
  transpose(): Slice {
    const [rows, cols] = this.shape;
    const out = allocate(this.size, this.dtype);
    for (let i = 0; i < rows; i += 1) {
      for (let j = 0; j < cols; j += 1) {
        out[j * rows + i] = this.data[i * cols + j];
      }
    }
    return new Slice([cols, rows], out);
  }
}

function checkIndex(index: number, limit: number, axis: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= limit) {
    throw new OutOfBoundsError(
      `${axis} index ${index} out of range [0, ${limit})`,
      "index",
      index,
      index + 1,
      limit,
    );
  }
}
