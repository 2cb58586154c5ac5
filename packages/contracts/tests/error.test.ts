import { describe, expect, it } from "vitest";
import { GraphError } from "../src";

describe("GraphError", () => {
  it("names the operation in not-found messages", () => {
    const error = GraphError.vertexNotFound("Graph.degree", { vertex: "9" });

    expect(error.code).toBe("VERTEX_NOT_FOUND");
    expect(error.message).toBe("Graph.degree: vertex is not part of this graph");
    expect(error).toBeInstanceOf(Error);
    expect(GraphError.isGraphError(error)).toBe(true);
    expect(GraphError.isGraphError(new Error("plain"))).toBe(false);
  });

  it("serializes with details only when present", () => {
    expect(GraphError.queueEmpty("AdaptablePriorityQueue.min").toJSON()).toEqual({
      name: "GraphError",
      code: "QUEUE_EMPTY",
      message: "AdaptablePriorityQueue.min: queue is empty",
    });
    expect(GraphError.negativeWeight({ cost: -3 }).toJSON()).toEqual({
      name: "GraphError",
      code: "NEGATIVE_WEIGHT",
      message: "Edge costs must be finite and non-negative",
      details: { cost: -3 },
    });
  });
});
