import { describe, expect, it } from "vitest";
import type { Prediction } from "@/types/tft";
import { aggregateContention, rankContention } from "./lobby-aggregation";

describe("aggregateContention", () => {
  it("sums each player's top prediction per trait", () => {
    const byPlayer = new Map<string, Prediction[]>([
      [
        "P1",
        [
          { core: ["A", "B"], probability: 0.6 },
          { core: ["D", "E"], probability: 0.4 },
        ],
      ],
      ["P2", [{ core: ["A", "C"], probability: 0.5 }]],
      ["P3", []],
    ]);

    const tally = aggregateContention(byPlayer);

    expect([...tally.keys()]).toEqual(["A", "B", "C"]);
    expect(tally.get("A")).toBeCloseTo(1.1);
    expect(tally.get("B")).toBe(0.6);
    expect(tally.get("C")).toBe(0.5);
    expect(tally.has("D")).toBe(false);
    expect(rankContention(tally).mostContested[0].trait).toBe("A");
  });

  it("is empty when nobody has predictions", () => {
    expect(aggregateContention(new Map([["P1", []]])).size).toBe(0);
  });
});

describe("rankContention", () => {
  it("orders most contested descending and least contested ascending", () => {
    const tally = new Map([
      ["A", 0.5],
      ["B", 2],
      ["C", 1],
    ]);
    const { mostContested, leastContested } = rankContention(tally, 2);
    expect(mostContested).toEqual([
      { trait: "B", score: 2 },
      { trait: "C", score: 1 },
    ]);
    expect(leastContested).toEqual([
      { trait: "A", score: 0.5 },
      { trait: "C", score: 1 },
    ]);
  });

  it("overlaps when there are few traits", () => {
    const { mostContested, leastContested } = rankContention(new Map([["A", 1]]));
    expect(mostContested).toEqual([{ trait: "A", score: 1 }]);
    expect(leastContested).toEqual([{ trait: "A", score: 1 }]);
  });

  it("caps both views at 8 by default", () => {
    const tally = new Map(Array.from({ length: 12 }, (_, i) => [`T${i}`, i] as [string, number]));
    const { mostContested, leastContested } = rankContention(tally);
    expect(mostContested).toHaveLength(8);
    expect(mostContested[0].trait).toBe("T11");
    expect(leastContested).toHaveLength(8);
    expect(leastContested[0].trait).toBe("T0");
  });
});
