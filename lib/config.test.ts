import { describe, expect, it } from "vitest";
import { DEFAULT_SCRAPE_USER_AGENT, loadConfig, maskApiKey, parseRiotId } from "./config";
import { ConfigError } from "./errors";

const BASE_ENV = { RIOT_API_KEY: "RGAPI-test-0000-1111", RIOT_ID: "Someone#EUW" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(BASE_ENV)).toEqual({
      apiKey: "RGAPI-test-0000-1111",
      riotId: { gameName: "Someone", tagLine: "EUW" },
      platformGuess: undefined,
      scrape: { enabled: true, delayMs: 1000, userAgent: DEFAULT_SCRAPE_USER_AGENT },
      matchSamples: 12,
      fallbackSamples: 4,
      rateLimitBaseDelayMs: 1000,
      logLevel: "info",
      logFormat: "pretty",
    });
  });

  it("strips quotes pasted around the key", () => {
    expect(loadConfig({ ...BASE_ENV, RIOT_API_KEY: ' "RGAPI-test" ' }).apiKey).toBe("RGAPI-test");
  });

  it("rejects a missing or malformed key", () => {
    expect(() => loadConfig({ RIOT_ID: "A#B" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...BASE_ENV, RIOT_API_KEY: "test-secret" })).toThrow(ConfigError);
  });

  it("rejects a missing Riot ID and an unknown platform", () => {
    expect(() => loadConfig({ RIOT_API_KEY: "RGAPI-test" })).toThrow(ConfigError);
    expect(() => loadConfig({ ...BASE_ENV, RIOT_PLATFORM: "mars1" })).toThrow('Unknown platform "mars1"');
  });

  it("lets CLI overrides win over the environment", () => {
    const config = loadConfig(
      { ...BASE_ENV, RIOT_PLATFORM: "na1", SCRAPE_ENABLED: "true", MATCH_SAMPLES: "20" },
      { riotId: "Other#KR1", platform: " KR ", scrapeEnabled: false, matchSamples: 8 }
    );
    expect(config.riotId).toEqual({ gameName: "Other", tagLine: "KR1" });
    expect(config.platformGuess).toBe("kr");
    expect(config.scrape.enabled).toBe(false);
    expect(config.matchSamples).toBe(8);
  });

  it("falls back to defaults for out-of-range or unparsable values", () => {
    const config = loadConfig({
      ...BASE_ENV,
      MATCH_SAMPLES: "0",
      FALLBACK_SAMPLES: "lots",
      SCRAPE_DELAY_MS: "2500",
      SCRAPE_ENABLED: "maybe",
      LOG_LEVEL: "DEBUG",
      LOG_FORMAT: "json",
    });
    expect(config.matchSamples).toBe(12);
    expect(config.fallbackSamples).toBe(4);
    expect(config.scrape.delayMs).toBe(2500);
    expect(config.scrape.enabled).toBe(true);
    expect(config.logLevel).toBe("debug");
    expect(config.logFormat).toBe("json");
  });

  it("reads SCRAPE_ENABLED=0 as disabled", () => {
    expect(loadConfig({ ...BASE_ENV, SCRAPE_ENABLED: "0" }).scrape.enabled).toBe(false);
  });
});

describe("parseRiotId", () => {
  it("splits on the first #", () => {
    expect(parseRiotId(" Name With Spaces # TAG ")).toEqual({ gameName: "Name With Spaces", tagLine: "TAG" });
  });

  it("requires both parts", () => {
    expect(() => parseRiotId("NoTag")).toThrow(ConfigError);
    expect(() => parseRiotId("Name#")).toThrow(ConfigError);
  });
});

describe("maskApiKey", () => {
  it("keeps only the ends of a long key", () => {
    expect(maskApiKey("RGAPI-test-0000-1111")).toBe("RGAPI-te...1111");
    expect(maskApiKey("RGAPI-test")).toBe("RGAPI-test");
  });
});
