import { describe, expect, it } from "vitest";
import { Err, GraphError, Ok } from "../src";

describe("Result", () => {
  it("maps and unwraps a success", () => {
    const res = Ok<number, GraphError>(2).map((n) => n * 3);

    expect(res.success).toBe(true);
    expect(res.isErr()).toBe(false);
    expect(res.getOrThrow()).toBe(6);
  });

  it("carries an error through map and flatMap", () => {
    const failure = GraphError.unreachable({ destination: "7" });
    const res = Err<number, GraphError>(failure)
      .map((n) => n + 1)
      .flatMap((n) => Ok(n * 2));

    expect(res.isErr()).toBe(true);
    expect(res.error).toBe(failure);
    expect(() => res.getOrThrow()).toThrow(failure);
  });

  it("chains into a failure with flatMap", () => {
    const res = Ok<number, GraphError>(1).flatMap(() =>
      Err(GraphError.queueEmpty("test")),
    );

    expect(res.error.code).toBe("QUEUE_EMPTY");
  });

  it("refuses to read the wrong side", () => {
    expect(() => Ok(1).error).toThrow("Cannot read the error of a successful Result");
    expect(() => Err("boom").value).toThrow("Cannot read the value of a failed Result");
  });
});
