/**
 * Failure codes raised by graph construction, the priority queue and
 * route searches.
 */
export type GraphErrorCode =
  | "VERTEX_NOT_FOUND"
  | "QUEUE_EMPTY"
  | "INVALID_HANDLE"
  | "UNREACHABLE"
  | "NEGATIVE_WEIGHT"
  | "INPUT_INVALID";

/**
 * Single error type for every routegraph operation.
 *
 * @example
 * ```typescript
 * throw GraphError.vertexNotFound("Graph.degree", { vertex: "42" });
 * ```
 */
export class GraphError extends Error {
  override readonly name = "GraphError";

  constructor(
    public readonly code: GraphErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraphError);
    }
  }

  static vertexNotFound(
    operation: string,
    details?: Record<string, unknown>,
  ): GraphError {
    return new GraphError(
      "VERTEX_NOT_FOUND",
      `${operation}: vertex is not part of this graph`,
      details,
    );
  }

  static queueEmpty(operation: string): GraphError {
    return new GraphError("QUEUE_EMPTY", `${operation}: queue is empty`);
  }

  static invalidHandle(operation: string): GraphError {
    return new GraphError(
      "INVALID_HANDLE",
      `${operation}: handle is not attached to this queue`,
    );
  }

  static unreachable(details?: Record<string, unknown>): GraphError {
    return new GraphError(
      "UNREACHABLE",
      "Destination is not reachable from the source",
      details,
    );
  }

  static negativeWeight(details?: Record<string, unknown>): GraphError {
    return new GraphError(
      "NEGATIVE_WEIGHT",
      "Edge costs must be finite and non-negative",
      details,
    );
  }

  static inputInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): GraphError {
    return new GraphError("INPUT_INVALID", message, details);
  }

  static isGraphError(error: unknown): error is GraphError {
    return error instanceof GraphError;
  }

  toJSON(): {
    name: string;
    code: GraphErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
