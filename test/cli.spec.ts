import { describe, expect, it, vi } from "vitest";
import { type CubeDescription, type Tile, UsageError } from "../src";
import { type CliDeps, formatSummary, inferFormat, parseArgs, run, type SliceSource } from "../src/cli";

const BASE_ARGS = ["--base-url", "https://example.test/query", "--guid", "abc", "--dim", "0", "--lineno", "10"];

const rowTiles: Tile[] = [
  { layout: { initial_skip: 0, chunk_size: 3, iterations: 1, substride: 0, superstride: 0 }, v: [1, 2, 3] },
  { layout: { initial_skip: 3, chunk_size: 3, iterations: 1, substride: 0, superstride: 0 }, v: [4, 5, 6] },
];

const cube: CubeDescription = {
  functions: { slice: "query/abc/slice" },
  dimensions: [
    { dimension: 0, size: 5, keys: [10, 11, 12, 13, 14] },
    { dimension: 1, size: 2, keys: [1, 2] },
    { dimension: 2, size: 3, keys: [0, 4, 8] },
  ],
};

function harness(tiles: Tile[] = rowTiles) {
  const out: string[] = [];
  const err: string[] = [];
  const source: SliceSource = {
    describeCube: vi.fn(async () => cube),
    fetchSlice: vi.fn(async () => tiles),
  };
  const createClient = vi.fn<CliDeps["createClient"]>(() => source);
  const writeSlice = vi.fn<CliDeps["writeSlice"]>(async () => {});
  const deps: Partial<CliDeps> = {
    env: {},
    createClient,
    writeSlice,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    now: () => 1_000_000,
  };
  return { out, err, source, createClient, writeSlice, deps };
}

describe("parseArgs", () => {
  it("parses the fetch arguments", () => {
    const args = parseArgs([...BASE_ARGS, "--shape0", "2", "--shape1", "3", "-o", "out.npy", "--transpose"]);

    expect(args).toMatchObject({
      command: "fetch",
      baseUrl: "https://example.test/query",
      guid: "abc",
      dim: 0,
      lineno: 10,
      shape0: 2,
      shape1: 3,
      output: "out.npy",
      transpose: true,
      requireCoverage: false,
      f32: false,
    });
  });

  it("returns help without requiring other flags", () => {
    expect(parseArgs(["--help"]).command).toBe("help");
  });

  it("rejects bad input", () => {
    expect(() => parseArgs(["--dim", "x"])).toThrow("--dim expects an integer, got x");
    expect(() => parseArgs(["--lineno", "99999999999999999999"])).toThrow(
      "--lineno is out of the safe integer range: 99999999999999999999",
    );
    expect(() => parseArgs(["--guid"])).toThrow("--guid expects a value");
    expect(() => parseArgs(["--bogus"])).toThrow("unknown argument: --bogus");
    expect(() => parseArgs(["--guid", "abc", "--dim", "0"])).toThrow("--lineno is required");
    expect(() => parseArgs([...BASE_ARGS, "--shape0", "2"])).toThrow(UsageError);
    expect(() => parseArgs([...BASE_ARGS, "--format", "png"])).toThrow(
      "--format must be json, csv or npy, got png",
    );
  });
});

describe("inferFormat", () => {
  it("prefers the explicit format, then the extension", () => {
    expect(inferFormat("slice.NPY")).toBe("npy");
    expect(inferFormat("slice.csv", "json")).toBe("json");
    expect(inferFormat("slice.bin")).toBe("json");
    expect(inferFormat(undefined)).toBe("json");
  });
});

describe("formatSummary", () => {
  it("rounds to six significant digits", () => {
    expect(formatSummary({ shape: [2, 3], min: 1, max: 6, mean: 1 / 3, zeros: 0 })).toBe(
      "shape=[2, 3] min=1 max=6 mean=0.333333 zeros=0",
    );
  });
});

describe("run", () => {
  it("fetches, assembles and prints a summary", async () => {
    const h = harness();

    const code = await run([...BASE_ARGS, "--shape0", "2", "--shape1", "3", "--token", "test-token"], h.deps);

    expect(code).toBe(0);
    expect(h.out).toEqual(["shape=[2, 3] min=1 max=6 mean=3.5 zeros=0"]);
    expect(h.createClient).toHaveBeenCalledWith({ baseUrl: "https://example.test/query", token: "test-token" });
    expect(h.source.fetchSlice).toHaveBeenCalledWith("abc", 0, 10);
    expect(h.source.describeCube).not.toHaveBeenCalled();
  });

  it("derives the shape from the cube description", async () => {
    const h = harness();

    const code = await run(BASE_ARGS, h.deps);

    expect(code).toBe(0);
    expect(h.source.describeCube).toHaveBeenCalledWith("abc");
    expect(h.out).toEqual(["shape=[2, 3] min=1 max=6 mean=3.5 zeros=0"]);
  });

  it("signs a service token from the secret", async () => {
    const h = harness();

    await run([...BASE_ARGS, "--secret", "test-secret"], h.deps);

    const options = h.createClient.mock.calls[0][0];
    const payload = options.token?.split(".")[1] ?? "";
    expect(JSON.parse(Buffer.from(payload, "base64url").toString("utf8"))).toEqual({ exp: 1000 + 3600 });
  });

  it("writes the transposed slice in the format of the file extension", async () => {
    const h = harness();

    await run([...BASE_ARGS, "--transpose", "--output", "slice.csv"], h.deps);

    expect(h.writeSlice).toHaveBeenCalledTimes(1);
    const [path, slice, format] = h.writeSlice.mock.calls[0];
    expect(path).toBe("slice.csv");
    expect(format).toBe("csv");
    expect(slice.toArray()).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
    expect(h.out).toEqual(["shape=[3, 2] min=1 max=6 mean=3.5 zeros=0"]);
  });

  it("writes 64-bit values unless --f32 is given", async () => {
    const fractional: Tile[] = [
      { layout: { initial_skip: 0, chunk_size: 6, iterations: 1, substride: 0, superstride: 0 }, v: [0.1, 2, 3, 4, 5, 6] },
    ];
    const wide = harness(fractional);
    const narrow = harness(fractional);

    await run([...BASE_ARGS, "--output", "slice.npy"], wide.deps);
    await run([...BASE_ARGS, "--output", "slice.npy", "--f32"], narrow.deps);

    const [, f64] = wide.writeSlice.mock.calls[0];
    const [, f32] = narrow.writeSlice.mock.calls[0];
    expect(f64.dtype).toBe("f64");
    expect(f64.at(0, 0)).toBe(0.1);
    expect(f32.dtype).toBe("f32");
    expect(f32.at(0, 0)).toBe(Math.fround(0.1));
  });

  it("reports assembly errors without writing output", async () => {
    const bad: Tile[] = [
      { layout: { initial_skip: 4, chunk_size: 3, iterations: 1, substride: 0, superstride: 0 }, v: [1, 2, 3] },
    ];
    const h = harness(bad);

    const code = await run([...BASE_ARGS, "--output", "slice.npy"], h.deps);

    expect(code).toBe(1);
    expect(h.writeSlice).not.toHaveBeenCalled();
    expect(h.out).toEqual([]);
    expect(h.err).toEqual([
      "OutOfBoundsError: tile 0 iteration 0: destination range [4, 7) exceeds slice size 6",
    ]);
  });

  it("fails coverage checks on request", async () => {
    const h = harness(rowTiles.slice(0, 1));

    const code = await run([...BASE_ARGS, "--require-coverage"], h.deps);

    expect(code).toBe(1);
    expect(h.err[0]).toBe(
      "IncompleteCoverageError: 3 of 6 slice elements were never written (first at offset 3)",
    );
  });

  it("exits 2 on usage errors", async () => {
    const h = harness();

    const code = await run(["--guid", "abc"], h.deps);

    expect(code).toBe(2);
    expect(h.err[0]).toBe("UsageError: --dim is required");
    expect(h.createClient).not.toHaveBeenCalled();
  });

  it("requires a base URL from flags or environment", async () => {
    const h = harness();

    const code = await run(["--guid", "abc", "--dim", "0", "--lineno", "1"], h.deps);

    expect(code).toBe(2);
    expect(h.err[0]).toBe("UsageError: --base-url is required (or set SLICESTITCH_BASE_URL)");
  });

  it("takes the base URL from the environment", async () => {
    const h = harness();

    const code = await run(["--guid", "abc", "--dim", "0", "--lineno", "1"], {
      ...h.deps,
      env: { SLICESTITCH_BASE_URL: "https://example.test/env" },
    });

    expect(code).toBe(0);
    expect(h.createClient).toHaveBeenCalledWith({ baseUrl: "https://example.test/env", token: undefined });
  });

  it("prints usage for --help", async () => {
    const h = harness();

    expect(await run(["--help"], h.deps)).toBe(0);
    expect(h.out[0].startsWith("Usage: slicestitch")).toBe(true);
  });
});
