import type { VertexId } from "./model.js";

/** Base error used by the graph engine and the edge-list importer. */
export class GraphEngineError extends Error {
  public readonly code: string;
  public readonly hint: string;
  public readonly details: Record<string, unknown>;

  constructor(code: string, message: string, hint: string, details: Record<string, unknown>) {
    super(message);
    this.name = "GraphEngineError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

/** Role played by a vertex that an operation requires to be present. */
export type VertexRole = "start" | "end";

/** Error thrown when an operation references a vertex absent from the graph. */
export class InvalidVertexError extends GraphEngineError {
  public override readonly details: { vertex: VertexId; role: VertexRole };

  constructor(vertex: VertexId, role: VertexRole) {
    super("E-GRAPH-VERTEX", `unknown ${role} vertex '${vertex}'`, "add the vertex or load a graph that declares it", {
      vertex,
      role,
    });
    this.name = "InvalidVertexError";
    this.details = { vertex, role };
  }
}

/** Reason reported when an edge-list line cannot be turned into an edge. */
export type EdgeListParseReason = "field_count" | "weight";

/** Error thrown when an edge-list line is malformed. */
export class EdgeListParseError extends GraphEngineError {
  public override readonly details: { line: number; content: string; reason: EdgeListParseReason };

  constructor(line: number, content: string, reason: EdgeListParseReason) {
    super(
      "E-EDGELIST-PARSE",
      reason === "field_count"
        ? `line ${line}: expected '<source> <target> <weight>'`
        : `line ${line}: weight must be an integer`,
      "fix the offending line or import with the skip policy",
      { line, content, reason },
    );
    this.name = "EdgeListParseError";
    this.details = { line, content, reason };
  }
}
