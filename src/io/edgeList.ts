import { readFileSync } from "node:fs";
import { z } from "zod";

import { EdgeListParseError } from "../graph/errors.js";
import type { Graph, VertexId } from "../graph/model.js";
import type { StructuredLogger } from "../logger.js";

/** What the importer does with a malformed line. */
export type MalformedLinePolicy = "abort" | "skip";

export interface EdgeRecord {
  readonly source: VertexId;
  readonly target: VertexId;
  readonly weight: number;
}

export interface EdgeListLoadOptions {
  readonly onMalformedLine?: MalformedLinePolicy;
  readonly logger?: StructuredLogger;
  /** Label reported in log entries, usually the file path. */
  readonly source?: string;
}

export interface EdgeListLoadReport {
  readonly edgesAdded: number;
  readonly skipped: EdgeListParseError[];
}

const IdentifierToken = z.string().min(1);

const WeightToken = z
  .string()
  .regex(/^[-+]?\d+$/)
  .transform((value) => Number.parseInt(value, 10))
  .refine((value) => Number.isSafeInteger(value));

/** `<source> <target> <integer weight>` once the line is split on whitespace. */
const EdgeLineSchema = z.tuple([IdentifierToken, IdentifierToken, WeightToken]);

/** Parses one edge-list line; `lineNumber` is 1-based. */
export function parseEdgeLine(text: string, lineNumber: number): EdgeRecord {
  const tokens = text.trim().split(/\s+/);
  const parsed = EdgeLineSchema.safeParse(tokens);
  if (!parsed.success) {
    // Tuple length issues carry an empty path; anything else is the weight token.
    const countIssue = parsed.error.issues.some((issue) => issue.path.length === 0);
    throw new EdgeListParseError(lineNumber, text, countIssue ? "field_count" : "weight");
  }
  const [source, target, weight] = parsed.data;
  return { source, target, weight };
}

/**
 * Adds one edge per line of {@link text}. Only the empty piece after a final
 * newline is ignored; blank lines elsewhere fail the field count. With the
 * default `abort` policy the first malformed line is rethrown and the edges of
 * earlier lines stay in the graph.
 */
export function loadEdgeList(graph: Graph, text: string, options: EdgeListLoadOptions = {}): EdgeListLoadReport {
  const policy = options.onMalformedLine ?? "abort";
  const skipped: EdgeListParseError[] = [];
  let edgesAdded = 0;

  const lines = text.split(/\r?\n/);
  // A trailing newline leaves one empty piece; any other blank line is malformed.
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  lines.forEach((line, index) => {
    let record: EdgeRecord;
    try {
      record = parseEdgeLine(line, index + 1);
    } catch (error) {
      if (policy === "abort" || !(error instanceof EdgeListParseError)) {
        throw error;
      }
      options.logger?.warn("edge_list_line_skipped", {
        source: options.source ?? null,
        line: error.details.line,
        reason: error.details.reason,
      });
      skipped.push(error);
      return;
    }
    graph.addEdge(record.source, record.target, record.weight);
    edgesAdded += 1;
  });

  options.logger?.info("edge_list_loaded", {
    source: options.source ?? null,
    edges_added: edgesAdded,
    skipped: skipped.length,
    order: graph.order(),
    size: graph.size(),
  });
  return { edgesAdded, skipped };
}

/** Synchronously reads {@link path} and feeds it to {@link loadEdgeList}. */
export function loadFromFile(graph: Graph, path: string, options: EdgeListLoadOptions = {}): EdgeListLoadReport {
  const text = readFileSync(path, "utf8");
  return loadEdgeList(graph, text, { ...options, source: options.source ?? path });
}
