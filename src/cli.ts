import { z } from "zod";
import { OUTPUT_FORMATS } from "./constants.js";
import { loadConfig, parseExtensionList } from "./config.js";
import { errorMessage, exitCodeFor, invalidInput } from "./errors.js";
import {
  formatGapReport,
  formatGridBatch,
  formatGridCandidates,
  formatRenameReport,
  formatStitchResult,
} from "./format.js";
import { sequenceFiles } from "./services/filename-sequencer.js";
import { enumerateGrids } from "./services/grid-enumerator.js";
import { calculateGaps, toggleMark } from "./services/mark-tracker.js";
import { collectImagePaths, prepareImagePaths, stitchGridQuery, stitchLinear } from "./services/stitcher.js";

export const CLI_ACTIONS = [
  "horizontal",
  "vertical",
  "grid",
  "grids",
  "number",
  "unnumber",
  "mark",
  "gaps",
] as const;
export type CliAction = (typeof CLI_ACTIONS)[number];

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const HELP_TEXT = `Usage:
  image-stitcher <action> [options] <paths...>

Actions:
  horizontal   Stitch images left to right
  vertical     Stitch images top to bottom
  grid         Stitch images in a grid (best fit unless --rows/--cols given)
  grids        List the grids that fit the given images
  number       Prefix file names with "1 ", "2 ", … in name order
  unnumber     Remove "<n> " prefixes from file names
  mark         Toggle the "z" mismatch mark on files
  gaps         Show the gaps between marked files (files or a directory)
  serve        Run as an MCP server on stdio

Options:
  --rows <n>            Grid rows
  --cols <n>            Grid columns
  --aspect <ratio>      Prefer grids with cols/rows close to this ratio
  --partial             Allow an incomplete last grid row
  --all                 Stitch every candidate grid and its transpose
  --center              Center tiles on the cross axis
  --background <color>  "#rrggbb", "#rgb" or "r,g,b" (default: white)
  --format <tiff|png>   Output format (default: tiff)
  --ext <list>          Extensions to accept, e.g. ".png,.tif"
  --version, -v         Print version and exit
  --help, -h            Print this help and exit`;

const VALUE_FLAGS = ["--rows", "--cols", "--aspect", "--background", "--format", "--ext"] as const;
const BOOLEAN_FLAGS = ["--partial", "--all", "--center"] as const;

const CliArgsSchema = z.object({
  action: z.enum(CLI_ACTIONS, {
    errorMap: () => ({ message: `Action must be one of: ${CLI_ACTIONS.join(", ")}` }),
  }),
  paths: z.array(z.string().min(1)).min(1, "No files provided"),
  rows: z.coerce.number().int().positive("--rows must be a positive integer").optional(),
  cols: z.coerce.number().int().positive("--cols must be a positive integer").optional(),
  aspect: z.coerce.number().positive("--aspect must be a positive number").optional(),
  background: z.string().min(1).optional(),
  format: z.enum(OUTPUT_FORMATS).optional(),
  ext: z.string().min(1).optional(),
  partial: z.boolean(),
  all: z.boolean(),
  center: z.boolean(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

function isValueFlag(name: string): name is (typeof VALUE_FLAGS)[number] {
  return VALUE_FLAGS.some((flag) => flag === name);
}

function isBooleanFlag(name: string): name is (typeof BOOLEAN_FLAGS)[number] {
  return BOOLEAN_FLAGS.some((flag) => flag === name);
}

export function parseArgs(argv: string[]): CliArgs {
  const [action, ...rest] = argv;
  const raw: Record<string, unknown> = {
    action,
    paths: [],
    partial: false,
    all: false,
    center: false,
  };
  const paths: string[] = [];

  let flagsDone = false;
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (flagsDone || !arg.startsWith("--")) {
      paths.push(arg);
      continue;
    }
    if (arg === "--") {
      flagsDone = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (isBooleanFlag(name)) {
      raw[name.slice(2)] = true;
    } else if (isValueFlag(name)) {
      const value = eq === -1 ? rest[++i] : arg.slice(eq + 1);
      if (value === undefined || value === "") {
        throw invalidInput(`${name} requires a value`);
      }
      raw[name.slice(2)] = value;
    } else {
      throw invalidInput(`Unknown option: ${name}`);
    }
  }
  raw.paths = paths;

  const parsed = CliArgsSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalidInput(parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

async function dispatch(args: CliArgs, io: CliIO, env: NodeJS.ProcessEnv): Promise<number> {
  const config = loadConfig(env, {
    background: args.background,
    format: args.format,
    extensions: args.ext ? parseExtensionList(args.ext) : undefined,
    align: args.center ? "center" : undefined,
  });

  switch (args.action) {
    case "horizontal":
    case "vertical": {
      const result = await stitchLinear(args.paths, args.action, config);
      io.out(formatStitchResult(result));
      return 0;
    }

    case "grid": {
      const batch = await stitchGridQuery(
        args.paths,
        { rows: args.rows, cols: args.cols, aspectRatio: args.aspect, partial: args.partial, all: args.all },
        config,
        (done, total, grid) => io.out(`Stitching grid ${done}/${total}: ${grid.rows}x${grid.cols}...`)
      );
      io.out(args.all ? formatGridBatch(batch) : batch.results.map(formatStitchResult).join("\n"));
      if (batch.failures.length > 0) {
        io.err(`Error: ${batch.failures.length} grid stitch(es) failed`);
        return 1;
      }
      return 0;
    }

    case "grids": {
      const count = prepareImagePaths(args.paths, config.extensions).length;
      const grids = enumerateGrids(count, {
        rows: args.rows,
        cols: args.cols,
        aspectRatio: args.aspect,
        partial: true,
      });
      io.out(formatGridCandidates(count, grids));
      return 0;
    }

    case "number":
    case "unnumber": {
      const report = await sequenceFiles(args.paths, args.action, config.extensions);
      io.out(formatRenameReport(report));
      return 0;
    }

    case "mark": {
      for (const p of args.paths) {
        const { to, marked } = await toggleMark(p);
        io.out(`${marked ? "Marked" : "Unmarked"}: ${to}`);
      }
      return 0;
    }

    case "gaps": {
      const images = await collectImagePaths(args.paths, config.extensions);
      io.out(formatGapReport(calculateGaps(images)));
      return 0;
    }
  }
}

/**
 * Runs one CLI invocation and returns its exit status. Results go to
 * `io.out`, failures to `io.err`.
 */
export async function runCli(
  argv: string[],
  options: { version: string; io?: CliIO; env?: NodeJS.ProcessEnv }
): Promise<number> {
  const io = options.io ?? consoleIO;
  const end = argv.indexOf("--");
  const leading = end === -1 ? argv : argv.slice(0, end);

  if (leading.includes("--version") || leading.includes("-v")) {
    io.out(options.version);
    return 0;
  }
  if (leading.includes("--help") || leading.includes("-h")) {
    io.out(`image-stitcher v${options.version}\n\n${HELP_TEXT}`);
    return 0;
  }
  if (argv.length === 0) {
    io.err(HELP_TEXT);
    return exitCodeFor(invalidInput("No action given"));
  }

  try {
    const args = parseArgs(argv);
    return await dispatch(args, io, options.env ?? process.env);
  } catch (error) {
    io.err(`Error: ${errorMessage(error)}`);
    return exitCodeFor(error);
  }
}
