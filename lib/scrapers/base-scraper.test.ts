import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "@/lib/logger";
import { createFakeFetch, noSleep, statusResponse, textResponse, type FakeRoute } from "@/lib/testing/fake-fetch";
import { fetchHtml, type ScrapeContext } from "./base-scraper";
import { RobotsPolicy } from "./robots-policy";

const logger = createLogger("test", { level: "silent" });
const ORIGIN = "https://tactics.tools";
const PAGE_URL = `${ORIGIN}/player/na/Someone/NA1`;

function contextFor(page: FakeRoute, robots = "") {
  const fake = createFakeFetch([
    [`${ORIGIN}/robots.txt`, () => textResponse(robots)],
    [PAGE_URL, page],
  ]);
  const ctx: ScrapeContext = {
    policy: new RobotsPolicy({
      origin: ORIGIN,
      minIntervalMs: 0,
      userAgent: "test-agent",
      logger,
      fetchImpl: fake.fetch,
      sleep: noSleep,
    }),
    userAgent: "test-agent",
    logger,
    fetchImpl: fake.fetch,
    sleep: noSleep,
  };
  return { ctx, fake };
}

describe("fetchHtml", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the page body", async () => {
    const { ctx } = contextFor(() => textResponse("<html>profile</html>"));
    expect(await fetchHtml(PAGE_URL, ctx)).toEqual({ kind: "ok", html: "<html>profile</html>" });
  });

  it("skips paths disallowed by robots.txt without fetching them", async () => {
    const { ctx, fake } = contextFor(() => textResponse("unused"), "User-agent: *\nDisallow: /player/\n");
    expect(await fetchHtml(PAGE_URL, ctx)).toEqual({ kind: "disallowed", path: "/player/na/Someone/NA1" });
    expect(fake.calls).toEqual([`${ORIGIN}/robots.txt`]);
  });

  it("maps 404 to not_found", async () => {
    const { ctx } = contextFor(() => statusResponse(404));
    expect(await fetchHtml(PAGE_URL, ctx)).toEqual({ kind: "not_found" });
  });

  it("times out a page whose body stalls after 12 s", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    const { ctx, fake } = contextFor(
      () => new Response(new ReadableStream({ start() {} }), { status: 200, headers: { "content-type": "text/html" } })
    );

    const pending = fetchHtml(PAGE_URL, ctx);
    await vi.waitFor(() => expect(fake.calls).toContain(PAGE_URL));
    await vi.advanceTimersByTimeAsync(12_000);

    expect(await pending).toEqual({
      kind: "failure",
      failure: { kind: "timeout", url: PAGE_URL, message: "no response after 12000ms" },
    });
  });
});
