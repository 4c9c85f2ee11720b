import { writeFile } from "node:fs/promises";

import type { Slice } from "./assemble/slice";

export const OUTPUT_FORMATS = ["json", "csv", "npy"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function formatJson(slice: Slice): string {
  return JSON.stringify({ shape: slice.shape, data: slice.toArray() });
}

export function formatCsv(slice: Slice): string {
  let out = "";
  for (let i = 0; i < slice.rows; i += 1) {
    out += slice.row(i).join(",") + "\n";
  }
  return out;
}

const NPY_MAGIC = [0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]; // \x93NUMPY
const NPY_PREAMBLE = NPY_MAGIC.length + 4; // magic + version + u16 header length
const NPY_ALIGN = 64;

export function npyHeader(slice: Slice): string {
  const descr = slice.dtype === "f64" ? "<f8" : "<f4";
  const dict = `{'descr': '${descr}', 'fortran_order': False, 'shape': (${slice.rows}, ${slice.cols}), }`;
  const unpadded = NPY_PREAMBLE + dict.length + 1;
  const pad = (NPY_ALIGN - (unpadded % NPY_ALIGN)) % NPY_ALIGN;
  return dict + " ".repeat(pad) + "\n";
}

/**
 * NPY v1.0, little-endian, C order.
 */
export function encodeNpy(slice: Slice): Uint8Array {
  const header = npyHeader(slice);
  const itemSize = slice.dtype === "f64" ? 8 : 4;
  const dataOffset = NPY_PREAMBLE + header.length;
  const bytes = new Uint8Array(dataOffset + slice.size * itemSize);
  const view = new DataView(bytes.buffer);

  bytes.set(NPY_MAGIC, 0);
  bytes[6] = 1;
  bytes[7] = 0;
  view.setUint16(8, header.length, true);
  for (let i = 0; i < header.length; i += 1) {
    bytes[NPY_PREAMBLE + i] = header.charCodeAt(i);
  }
  for (let i = 0; i < slice.size; i += 1) {
    const at = dataOffset + i * itemSize;
    if (itemSize === 8) {
      view.setFloat64(at, slice.data[i], true);
    } else {
      view.setFloat32(at, slice.data[i], true);
    }
  }
  return bytes;
}

export function encodeSlice(slice: Slice, format: OutputFormat): string | Uint8Array {
  switch (format) {
    case "json":
      return formatJson(slice);
    case "csv":
      return formatCsv(slice);
    case "npy":
      return encodeNpy(slice);
  }
}

export async function writeSlice(path: string, slice: Slice, format: OutputFormat): Promise<void> {
  await writeFile(path, encodeSlice(slice, format));
}

export type SliceSummary = {
  shape: [number, number];
  min: number;
  max: number;
  mean: number;
  zeros: number;
};

export function summarize(slice: Slice): SliceSummary {
  let min = Infinity;
  let max = -Infinity;
  let total = 0;
  let zeros = 0;
  for (let i = 0; i < slice.size; i += 1) {
    const v = slice.data[i];
    if (v < min) min = v;
    if (v > max) max = v;
    if (v === 0) zeros += 1;
    total += v;
  }
  return { shape: [slice.rows, slice.cols], min, max, mean: total / slice.size, zeros };
}
