/**
 * Canonical pure shape utility functions.
 *
 * Zero dependencies; importable from any layer.
 */

export type Shape2D = [rows: number, cols: number];

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

/**
 * Row-major (C-style) strides in elements: last dimension is contiguous.
 */
export function computeStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i -= 1) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

export function isDimension(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}
