#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { z } from "zod";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { isEulerian } from "./algorithms/eulerian.js";
import { shortestPath } from "./algorithms/dijkstra.js";
import { loadSettings } from "./config/settings.js";
import type { EnvSource } from "./config/env.js";
import { describeError } from "./errors.js";
import { GraphEngineError } from "./graph/errors.js";
import { Graph } from "./graph/model.js";
import { renderAdjacency, snapshotGraph } from "./graph/render.js";
import { loadFromFile, type MalformedLinePolicy } from "./io/edgeList.js";
import { StructuredLogger } from "./logger.js";

const VertexArg = z.string().min(1);

/** Analyses understood by the CLI together with the arguments each expects. */
const AnalysisRequestSchema = z.discriminatedUnion("name", [
  z.object({ name: z.literal("display"), args: z.tuple([]) }),
  z.object({ name: z.literal("summary"), args: z.tuple([]) }),
  z.object({ name: z.literal("adjacent"), args: z.tuple([VertexArg]) }),
  z.object({ name: z.literal("degree"), args: z.tuple([VertexArg]) }),
  z.object({ name: z.literal("areAdjacent"), args: z.tuple([VertexArg, VertexArg]) }),
  z.object({ name: z.literal("eulerian"), args: z.tuple([]) }),
  z.object({ name: z.literal("shortestPath"), args: z.tuple([VertexArg, VertexArg]) }),
]);

export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

interface CliOptions {
  readonly file: string;
  readonly format: "text" | "json";
  readonly analyses: AnalysisRequest[];
  readonly directed?: boolean;
  readonly onMalformedLine?: MalformedLinePolicy;
}

interface AnalysisOutcome {
  readonly name: AnalysisRequest["name"];
  readonly result: unknown;
  readonly lines: string[];
}

/** Line sinks used for command output; tests replace them with spies. */
export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliDependencies {
  readonly io?: CliIo;
  readonly env?: EnvSource;
  readonly logger?: StructuredLogger;
}

/** Error raised for command lines that cannot be interpreted. */
export class CliUsageError extends GraphEngineError {
  constructor(message: string) {
    super("E-CLI-USAGE", message, "run without arguments to print the usage", {});
    this.name = "CliUsageError";
  }
}

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/**
 * Loads the edge list named on the command line, runs the requested analyses
 * and prints their reports. Resolves with the process exit code.
 */
export async function runCli(argv: string[], dependencies: CliDependencies = {}): Promise<number> {
  const io = dependencies.io ?? consoleIo;
  if (argv.length === 0) {
    printUsage(io);
    return 1;
  }

  const settings = loadSettings(dependencies.env ?? process.env);
  const logger =
    dependencies.logger ??
    new StructuredLogger({ logFile: settings.logFile, minLevel: settings.logLevel, stream: "stderr" });

  let format = requestedFormat(argv);
  try {
    const options = parseArgs(argv);
    format = options.format;
    const graph = new Graph({ directed: options.directed ?? settings.directed });
    const report = loadFromFile(graph, options.file, {
      onMalformedLine: options.onMalformedLine ?? settings.onMalformedLine,
      logger,
    });

    const analyses: AnalysisRequest[] =
      options.analyses.length > 0 ? options.analyses : [{ name: "display", args: [] }];
    const outcomes = analyses.map((request) => {
      const outcome = runAnalysis(graph, request);
      logger.debug("cli_analysis_completed", { name: request.name, args: request.args });
      return outcome;
    });

    if (format === "json") {
      io.stdout(
        JSON.stringify(
          {
            file: options.file,
            directed: graph.directed,
            skipped: report.skipped.map((error) => error.details),
            analyses: outcomes.map(({ name, result }) => ({ name, result })),
          },
          null,
          2,
        ),
      );
    } else {
      for (const skipped of report.skipped) {
        io.stderr(`warning: skipped line ${skipped.details.line} (${skipped.details.reason})`);
      }
      outcomes.forEach((outcome, index) => {
        if (index > 0) {
          io.stdout("");
        }
        io.stdout(`# ${outcome.name}`);
        for (const line of outcome.lines) {
          io.stdout(line);
        }
      });
    }
    await logger.flush();
    return 0;
  } catch (error) {
    const normalised = describeError(error);
    logger.error("cli_failed", normalised);
    if (format === "json") {
      io.stderr(JSON.stringify({ ok: false, error: normalised }, null, 2));
    } else {
      io.stderr(`error ${normalised.code}: ${normalised.message}`);
    }
    await logger.flush();
    return 1;
  }
}

function runAnalysis(graph: Graph, request: AnalysisRequest): AnalysisOutcome {
  switch (request.name) {
    case "display": {
      const rendered = renderAdjacency(graph);
      const lines = rendered.length === 0 ? [] : rendered.slice(0, -1).split("\n");
      return { name: request.name, result: snapshotGraph(graph), lines };
    }
    case "summary": {
      const result = { order: graph.order(), size: graph.size() };
      return {
        name: request.name,
        result,
        lines: [`Order (Vertices): ${result.order}`, `Size (Edges): ${result.size}`],
      };
    }
    case "adjacent": {
      const [vertex] = request.args;
      const adjacent = [...graph.adjacentVertices(vertex)];
      return {
        name: request.name,
        result: { vertex, adjacent },
        lines: [`Adjacent vertices of ${vertex}: [${adjacent.join(", ")}]`],
      };
    }
    case "degree": {
      const [vertex] = request.args;
      const degree = graph.degree(vertex);
      const line =
        typeof degree === "number"
          ? `Degree of ${vertex}: ${degree}`
          : `Degree of ${vertex} - In: ${degree.inDegree}, Out: ${degree.outDegree}`;
      return { name: request.name, result: { vertex, degree }, lines: [line] };
    }
    case "areAdjacent": {
      const [first, second] = request.args;
      const adjacent = graph.areAdjacent(first, second);
      return {
        name: request.name,
        result: { first, second, adjacent },
        lines: [`${first} and ${second} are ${adjacent ? "adjacent" : "not adjacent"}.`],
      };
    }
    case "eulerian": {
      const result = isEulerian(graph);
      const verdict = result.eulerian
        ? "Eulerian"
        : result.semiEulerian
          ? "Semi-Eulerian"
          : "neither Eulerian nor Semi-Eulerian";
      return { name: request.name, result, lines: [`Graph is ${verdict}.`] };
    }
    case "shortestPath": {
      const [start, end] = request.args;
      const result = shortestPath(graph, start, end);
      const line = result.reachable
        ? `Shortest path from ${start} to ${end} is ${result.path.join(" -> ")} with cost ${result.cost}.`
        : "No path exists between the vertices.";
      return { name: request.name, result: { start, end, ...result }, lines: [line] };
    }
  }
}

/**
 * Output format asked for on the command line, looked up before full parsing
 * so that argument errors are reported in that format too.
 */
function requestedFormat(argv: string[]): CliOptions["format"] {
  const flag = argv.lastIndexOf("--format");
  return flag >= 0 && argv[flag + 1] === "json" ? "json" : "text";
}

function parseArgs(argv: string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new CliUsageError("first positional argument must be the path to an edge-list file");
  }
  const analyses: AnalysisRequest[] = [];
  let format: CliOptions["format"] = "text";
  let directed: boolean | undefined;
  let onMalformedLine: MalformedLinePolicy | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--analysis": {
        const name = rest[++i];
        if (!name) {
          throw new CliUsageError("--analysis expects a name");
        }
        const args: string[] = [];
        while (i + 1 < rest.length && !rest[i + 1]?.startsWith("--")) {
          args.push(rest[++i] ?? "");
        }
        analyses.push(AnalysisRequestSchema.parse({ name, args }));
        break;
      }
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--directed":
        directed = true;
        break;
      case "--undirected":
        directed = false;
        break;
      case "--skip-malformed":
        onMalformedLine = "skip";
        break;
      default:
        throw new CliUsageError(`unknown argument '${token}'`);
    }
  }

  return {
    file,
    format,
    analyses,
    ...(directed === undefined ? {} : { directed }),
    ...(onMalformedLine === undefined ? {} : { onMalformedLine }),
  };
}

function printUsage(io: CliIo): void {
  io.stdout(
    "Usage: graph-inspector <edges.txt> [--directed|--undirected] [--skip-malformed] [--format json|text] [--analysis name arg1 arg2 ...]",
  );
  io.stdout("Analyses: display, summary, adjacent <v>, degree <v>, areAdjacent <v1> <v2>, eulerian, shortestPath <start> <end>");
  io.stdout("Examples:");
  io.stdout("  graph-inspector roads.txt --analysis summary");
  io.stdout("  graph-inspector roads.txt --analysis shortestPath A C --format json");
}

/**
 * Whether the script started by Node is this module. npm installs the
 * command as a symlink under `node_modules/.bin`, so both sides are resolved
 * to their real paths before comparing.
 */
function isEntryPoint(executedPath: string | undefined, moduleUrl: string): boolean {
  if (!executedPath) {
    return false;
  }
  const modulePath = fileURLToPath(moduleUrl);
  try {
    return realpathSync(executedPath) === realpathSync(modulePath);
  } catch (error) {
    const code: unknown = error instanceof Error ? Reflect.get(error, "code") : undefined;
    if (code === "ENOENT") {
      return executedPath === modulePath;
    }
    throw error;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/**
 * Exposes internal helpers for the test suite without making them part of the
 * package's public API.
 */
export const __testing = {
  isEntryPoint,
  parseArgs,
  requestedFormat,
  runAnalysis,
};
