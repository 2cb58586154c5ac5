import { describe, expect, it } from "vitest";
import { SeededRandom } from "../src";

describe("SeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const a = new SeededRandom(1234);
    const b = new SeededRandom(1234);

    const first = Array.from({ length: 10 }, () => a.next());
    const second = Array.from({ length: 10 }, () => b.next());

    expect(first).toEqual(second);
  });

  it("keeps int within inclusive bounds", () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const n = rng.int(-3, 3);
      expect(n).toBeGreaterThanOrEqual(-3);
      expect(n).toBeLessThanOrEqual(3);
      expect(Number.isInteger(n)).toBe(true);
    }
  });

  it("picks nothing from an empty list", () => {
    const rng = new SeededRandom(7);

    expect(rng.pick([])).toBeUndefined();
    expect(rng.pick(["only"])).toBe("only");
  });
});
