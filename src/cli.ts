/**
 * slicestitch command line: fetch one slice, assemble it, summarize or write it.
 */

import { TileAssembler } from "./assemble/assembler";
import type { Slice } from "./assemble/slice";
import type { Tile } from "./assemble/types";
import type { CubeDescription, SliceClientOptions } from "./client/slice-client";
import { SliceClient, sliceShape } from "./client/slice-client";
import { createServiceToken } from "./client/token";
import { loadConfig } from "./config";
import { UsageError } from "./core/errors";
import type { Shape2D } from "./core/shape";
import { createLogger, setLogLevel } from "./log";
import { isOutputFormat, type OutputFormat, type SliceSummary, summarize, writeSlice } from "./output";

const log = createLogger("cli");

export const USAGE = `Usage: slicestitch --base-url URL --guid GUID --dim D --lineno L [options]

Options:
  --shape0 N --shape1 M   Slice shape (derived from the cube description if omitted)
  --token T               Bearer token (or SLICESTITCH_TOKEN)
  --secret S              Sign an HS256 service token (or SLICESTITCH_SECRET)
  --output FILE, -o FILE  Write the slice to FILE
  --format json|csv|npy   Output encoding (default: from FILE extension, else json)
  --transpose             Write the transposed slice
  --require-coverage      Fail if any slice element is not written by a tile
  --f32                   Assemble into 32-bit floats (default: 64-bit)
  --verbose, -v           Debug logging
  --help, -h              Show this message`;

export interface CLIArgs {
  command: "fetch" | "help";
  baseUrl?: string;
  guid?: string;
  dim?: number;
  lineno?: number;
  shape0?: number;
  shape1?: number;
  token?: string;
  secret?: string;
  output?: string;
  format?: OutputFormat;
  transpose: boolean;
  requireCoverage: boolean;
  f32: boolean;
  verbose: boolean;
}

function parseInteger(flag: string, raw: string | undefined): number {
  if (raw === undefined || !/^-?\d+$/.test(raw)) {
    throw new UsageError(`${flag} expects an integer, got ${raw ?? "nothing"}`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new UsageError(`${flag} is out of the safe integer range: ${raw}`);
  }
  return value;
}

function requireValue(flag: string, raw: string | undefined): string {
  if (raw === undefined || raw.startsWith("--")) {
    throw new UsageError(`${flag} expects a value`);
  }
  return raw;
}

export function parseArgs(argv: readonly string[]): CLIArgs {
  const result: CLIArgs = {
    command: "fetch",
    transpose: false,
    requireCoverage: false,
    f32: false,
    verbose: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "--help":
      case "-h":
        result.command = "help";
        break;
      case "--base-url":
        result.baseUrl = requireValue(arg, argv[++i]);
        break;
      case "--guid":
        result.guid = requireValue(arg, argv[++i]);
        break;
      case "--dim":
        result.dim = parseInteger(arg, argv[++i]);
        break;
      case "--lineno":
        result.lineno = parseInteger(arg, argv[++i]);
        break;
      case "--shape0":
        result.shape0 = parseInteger(arg, argv[++i]);
        break;
      case "--shape1":
        result.shape1 = parseInteger(arg, argv[++i]);
        break;
      case "--token":
        result.token = requireValue(arg, argv[++i]);
        break;
      case "--secret":
        result.secret = requireValue(arg, argv[++i]);
        break;
      case "--output":
      case "-o":
        result.output = requireValue(arg, argv[++i]);
        break;
      case "--format": {
        const format = requireValue(arg, argv[++i]);
        if (!isOutputFormat(format)) {
          throw new UsageError(`--format must be json, csv or npy, got ${format}`);
        }
        result.format = format;
        break;
      }
      case "--transpose":
        result.transpose = true;
        break;
      case "--require-coverage":
        result.requireCoverage = true;
        break;
      case "--f32":
        result.f32 = true;
        break;
      case "--verbose":
      case "-v":
        result.verbose = true;
        break;
      default:
        throw new UsageError(`unknown argument: ${arg}`);
    }
  }

  if (result.command === "help") {
    return result;
  }
  if (result.guid === undefined) throw new UsageError("--guid is required");
  if (result.dim === undefined) throw new UsageError("--dim is required");
  if (result.lineno === undefined) throw new UsageError("--lineno is required");
  if ((result.shape0 === undefined) !== (result.shape1 === undefined)) {
    throw new UsageError("--shape0 and --shape1 must be given together");
  }
  return result;
}

export function inferFormat(path: string | undefined, explicit?: OutputFormat): OutputFormat {
  if (explicit) return explicit;
  const ext = path?.slice(path.lastIndexOf(".") + 1).toLowerCase();
  return ext !== undefined && isOutputFormat(ext) ? ext : "json";
}

export function formatSummary(summary: SliceSummary): string {
  const fmt = (n: number) => String(Number(n.toPrecision(6)));
  const [rows, cols] = summary.shape;
  return `shape=[${rows}, ${cols}] min=${fmt(summary.min)} max=${fmt(summary.max)} mean=${fmt(summary.mean)} zeros=${summary.zeros}`;
}

export type SliceSource = {
  describeCube(guid: string): Promise<CubeDescription>;
  fetchSlice(guid: string, dim: number, lineno: number): Promise<Tile[]>;
};

export type CliDeps = {
  env: Record<string, string | undefined>;
  createClient: (options: SliceClientOptions) => SliceSource;
  writeSlice: (path: string, slice: Slice, format: OutputFormat) => Promise<void>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  now: () => number;
};

const defaultDeps: CliDeps = {
  env: process.env,
  createClient: (options) => new SliceClient(options),
  writeSlice,
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  now: () => Date.now(),
};

async function execute(args: CLIArgs, deps: CliDeps): Promise<void> {
  const config = loadConfig(deps.env);
  if (args.verbose) {
    setLogLevel("debug");
  } else if (config.logLevel) {
    setLogLevel(config.logLevel);
  }

  const baseUrl = args.baseUrl ?? config.baseUrl;
  if (baseUrl === undefined) {
    throw new UsageError("--base-url is required (or set SLICESTITCH_BASE_URL)");
  }
  // parseArgs guarantees these for the fetch command
  const { guid, dim, lineno } = args;
  if (guid === undefined || dim === undefined || lineno === undefined) {
    throw new UsageError("--guid, --dim and --lineno are required");
  }

  let token = args.token ?? config.token;
  const secret = args.secret ?? config.secret;
  if (token === undefined && secret !== undefined) {
    token = createServiceToken(secret, { ttlSeconds: config.tokenTtlSeconds, now: deps.now() });
  }
  const client = deps.createClient({ baseUrl, token });

  let shape: Shape2D;
  if (args.shape0 !== undefined && args.shape1 !== undefined) {
    shape = [args.shape0, args.shape1];
  } else {
    shape = sliceShape(await client.describeCube(guid), dim);
    log.info(`derived slice shape [${shape[0]}, ${shape[1]}] from cube ${guid}`);
  }

  const tiles = await client.fetchSlice(guid, dim, lineno);
  const assembler = new TileAssembler({
    dtype: args.f32 ? "f32" : "f64",
    requireCoverage: args.requireCoverage,
  });
  const assembled = assembler.assemble(tiles, shape[0], shape[1]);
  const slice = args.transpose ? assembled.transpose() : assembled;

  if (args.output !== undefined) {
    const format = inferFormat(args.output, args.format);
    await deps.writeSlice(args.output, slice, format);
    log.info(`wrote ${format} slice to ${args.output}`);
  }
  deps.stdout(formatSummary(summarize(slice)));
}

/**
 * Run the CLI and return the process exit code: 0 on success, 2 for usage
 * errors, 1 for everything else. Nothing is written when assembly fails.
 */
export async function run(argv: readonly string[], deps: Partial<CliDeps> = {}): Promise<number> {
  const resolved: CliDeps = { ...defaultDeps, ...deps };
  try {
    const args = parseArgs(argv);
    if (args.command === "help") {
      resolved.stdout(USAGE);
      return 0;
    }
    await execute(args, resolved);
    return 0;
  } catch (e) {
    if (!(e instanceof Error)) {
      throw e;
    }
    resolved.stderr(`${e.name}: ${e.message}`);
    if (e instanceof UsageError) {
      resolved.stderr(USAGE);
      return 2;
    }
    return 1;
  }
}
