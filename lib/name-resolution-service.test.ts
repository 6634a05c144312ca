import { describe, expect, it } from "vitest";
import type { RiotName } from "@/types/tft";
import { createLogger } from "./logger";
import { createRiotClient } from "./riot-client";
import {
  MAX_NAME_WORKERS,
  createAccountNameResolver,
  displayLabel,
  resolveDisplayNames,
} from "./name-resolution-service";
import { createFakeFetch, jsonResponse, noSleep, statusResponse } from "./testing/fake-fetch";

const logger = createLogger("test", { level: "silent" });

describe("resolveDisplayNames", () => {
  it("never runs more than 6 lookups at once", async () => {
    let active = 0;
    let peak = 0;
    const resolve = async (puuid: string): Promise<RiotName> => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
      return { gameName: puuid.toUpperCase(), tagLine: "EUW" };
    };
    const puuids = Array.from({ length: 8 }, (_, i) => `p${i}`);

    const names = await resolveDisplayNames(puuids, resolve, logger);

    expect(peak).toBe(MAX_NAME_WORKERS);
    expect(names.size).toBe(8);
    expect(names.get("p3")).toEqual({ gameName: "P3", tagLine: "EUW" });
  });

  it("isolates failures to the player concerned", async () => {
    const resolve = async (puuid: string): Promise<RiotName | null> => {
      if (puuid === "bad") throw new Error("timeout");
      if (puuid === "nameless") return null;
      return { gameName: "Ok", tagLine: "NA1" };
    };
    const names = await resolveDisplayNames(["good", "bad", "nameless"], resolve, logger);
    expect([...names.keys()]).toEqual(["good"]);
  });

  it("returns an empty map for an empty lobby", async () => {
    const names = await resolveDisplayNames([], async () => null, logger);
    expect(names.size).toBe(0);
  });
});

describe("createAccountNameResolver", () => {
  const ACCOUNT_URL = "https://europe.api.riotgames.com/riot/account/v1/accounts/by-puuid";

  it("maps account-v1 payloads to names", async () => {
    const fake = createFakeFetch([
      [`${ACCOUNT_URL}/full`, () => jsonResponse({ puuid: "full", gameName: " Alpha ", tagLine: "EUW" })],
      [`${ACCOUNT_URL}/partial`, () => jsonResponse({ puuid: "partial", gameName: "Beta" })],
      [`${ACCOUNT_URL}/gone`, () => statusResponse(404)],
    ]);
    const resolve = createAccountNameResolver(createRiotClient("RGAPI-test", { fetchImpl: fake.fetch, sleep: noSleep }), "europe");
    expect(await resolve("full")).toEqual({ gameName: "Alpha", tagLine: "EUW" });
    expect(await resolve("partial")).toBeNull();
    expect(await resolve("gone")).toBeNull();
  });
});

describe("displayLabel", () => {
  it("prefers the Riot ID, then the spectator name, then the puuid prefix", () => {
    expect(displayLabel({ puuid: "abcdefghijk", name: { gameName: "A", tagLine: "B" }, spectatorName: "S" })).toBe("A#B");
    expect(displayLabel({ puuid: "abcdefghijk", spectatorName: "S" })).toBe("S");
    expect(displayLabel({ puuid: "abcdefghijk" })).toBe("abcdefgh");
  });
});
