import { describe, expect, it } from "vitest";
import { createLogger } from "./logger";
import { MatchHistoryExtractor, toEvidenceRecord } from "./match-history-extractor";
import { createRiotClient } from "./riot-client";
import { MatchSchema } from "./riot-schemas";
import { createFakeFetch, jsonResponse, noSleep, statusResponse } from "./testing/fake-fetch";

const logger = createLogger("test", { level: "silent" });
const REGIONAL = "https://americas.api.riotgames.com/tft/match/v1/matches";

function matchPayload(puuid: string, placement: number, traits: Array<[string, number, number]>) {
  return {
    metadata: { match_id: "NA1_x" },
    info: {
      participants: [
        { puuid: "someone-else", placement: 1, traits: [{ name: "Other", tier_current: 4, num_units: 9 }] },
        {
          puuid,
          placement,
          traits: traits.map(([name, tier_current, num_units]) => ({ name, tier_current, num_units })),
        },
      ],
    },
  };
}

describe("toEvidenceRecord", () => {
  it("reads the player's active traits and placement", () => {
    const match = MatchSchema.parse(
      matchPayload("me", 3, [
        ["Ambusher", 2, 4],
        ["Inactive", 0, 1],
      ])
    );
    expect(toEvidenceRecord(match, "me", 2)).toEqual({
      traits: [{ name: "Ambusher", tier: 2, units: 4 }],
      placement: 3,
      recencyIndex: 2,
    });
  });

  it("returns null when the player is absent or has no active trait", () => {
    const match = MatchSchema.parse(matchPayload("me", 3, [["Inactive", 0, 1]]));
    expect(toEvidenceRecord(match, "me", 0)).toBeNull();
    expect(toEvidenceRecord(match, "stranger", 0)).toBeNull();
  });

  it("defaults a missing placement to 9", () => {
    const match = MatchSchema.parse({
      info: { participants: [{ puuid: "me", traits: [{ name: "Void", tier_current: 1 }] }] },
    });
    expect(toEvidenceRecord(match, "me", 0)?.placement).toBe(9);
  });
});

describe("MatchHistoryExtractor", () => {
  it("builds records in newest-first order and skips broken matches", async () => {
    const fake = createFakeFetch([
      [`${REGIONAL}/by-puuid/me/ids`, () => jsonResponse(["NA1_3", "NA1_2", "NA1_1"])],
      [`${REGIONAL}/NA1_3`, () => jsonResponse(matchPayload("me", 1, [["Sniper", 3, 4], ["Family", 2, 3]]))],
      [`${REGIONAL}/NA1_2`, () => statusResponse(500)],
      [`${REGIONAL}/NA1_1`, () => jsonResponse(matchPayload("me", 6, [["Void", 2, 2]]))],
    ]);
    const client = createRiotClient("RGAPI-test", { fetchImpl: fake.fetch, sleep: noSleep });
    const extractor = new MatchHistoryExtractor(client, "americas", logger);

    const result = await extractor.extract("me", 4);

    expect(fake.calls[0]).toBe(`${REGIONAL}/by-puuid/me/ids?count=4`);
    expect(result).toEqual({
      kind: "evidence",
      items: [
        {
          traits: [
            { name: "Sniper", tier: 3, units: 4 },
            { name: "Family", tier: 2, units: 3 },
          ],
          placement: 1,
          recencyIndex: 0,
        },
        { traits: [{ name: "Void", tier: 2, units: 2 }], placement: 6, recencyIndex: 2 },
      ],
    });
  });

  it("returns empty when there is no history", async () => {
    const fake = createFakeFetch([[`${REGIONAL}/by-puuid/me/ids`, () => jsonResponse([])]]);
    const client = createRiotClient("RGAPI-test", { fetchImpl: fake.fetch, sleep: noSleep });
    const result = await new MatchHistoryExtractor(client, "americas", logger).extract("me", 4);
    expect(result).toEqual({ kind: "empty", reason: "no usable matches" });
  });

  it("returns a failure when the id list cannot be fetched", async () => {
    const fake = createFakeFetch([[`${REGIONAL}/by-puuid/me/ids`, () => statusResponse(500)]]);
    const client = createRiotClient("RGAPI-test", { fetchImpl: fake.fetch, sleep: noSleep });
    const result = await new MatchHistoryExtractor(client, "americas", logger).extract("me", 4);
    expect(result.kind).toBe("failure");
  });
});
