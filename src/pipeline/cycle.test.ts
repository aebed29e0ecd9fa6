import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { resolveStrategies, runGroupCycle } from "./cycle";
import type { CycleDeps, GroupPhase } from "./cycle";
import { createFetchSession } from "./fetcher";
import { fingerprintArticle } from "./fingerprint";
import { createDedupStore } from "../store/dedup-store";
import type { DedupStore } from "../store/dedup-store";
import { createCircuitBreaker } from "../delivery/circuit-breaker";
import { createHealthState } from "../delivery/health";
import type { HealthState } from "../delivery/health";
import { createDeliveryWorker } from "../delivery/worker";
import type { DeliveryTarget } from "../delivery/target";
import type { Translator } from "../llm/translator";
import type { AppConfig, GroupConfig } from "../config";
import { createTestArticle, createTestConfig } from "../test-utils/fixtures";

type FeedEntry = {
  readonly title: string;
  readonly link: string;
  readonly summary: string;
};

const BITCOIN: FeedEntry = {
  title: "Bitcoin climbs above key level",
  link: "https://news.example.com/crypto/bitcoin-climbs",
  summary: "Bitcoin rose sharply.",
};

const ETHER: FeedEntry = {
  title: "Ethereum developers ship upgrade",
  link: "https://news.example.com/crypto/ethereum-upgrade",
  summary: "The crypto network upgraded smoothly.",
};

const GOLD: FeedEntry = {
  title: "Gold edges higher on weak dollar",
  link: "https://news.example.com/commodities/gold-higher",
  summary: "Bullion gained in quiet trading.",
};

const BAKERY: FeedEntry = {
  title: "Local bakery wins award",
  link: "https://news.example.com/local/bakery",
  summary: "Fresh bread daily.",
};

function feed(entries: ReadonlyArray<FeedEntry>): string {
  const items = entries
    .map(
      (entry) => `
    <item>
      <title>${entry.title}</title>
      <link>${entry.link}</link>
      <description>${entry.summary}</description>
    </item>`,
    )
    .join("");
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Markets</title>
    <link>https://news.example.com</link>
    <description>Test feed for the relay</description>${items}
  </channel>
</rss>`;
}

type Route = { readonly status: number; readonly body: string };

function stubFetch(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (url: string) => {
    const route = routes[url] ?? { status: 404, body: "" };
    return {
      ok: route.status >= 200 && route.status < 300,
      status: route.status,
      statusText: route.status === 503 ? "Service Unavailable" : "OK",
      text: async () => route.body,
    };
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function rssSource(name: string, endpoint: string, extra: Record<string, unknown> = {}) {
  return { name, kind: "rss", endpoints: [endpoint], ...extra };
}

function firstGroup(config: AppConfig): GroupConfig {
  const group = config.groups[0];
  if (!group) throw new Error("test config has no groups");
  return group;
}

describe("resolveStrategies", () => {
  it("should use the source's chain before the chain for its kind", () => {
    const config = createTestConfig({
      fetch: {
        strategies: { direct: {}, mobile: { userAgent: "mobile" } },
        chains: { rss: ["direct"], html: ["direct"] },
      },
    });
    const group = firstGroup(config);
    const source = group.sources[0];
    if (!source) throw new Error("test group has no sources");

    expect(resolveStrategies(source, config.fetch).map((s) => s.name)).toEqual(["direct"]);
    expect(
      resolveStrategies({ ...source, strategies: ["mobile", "direct"] }, config.fetch).map(
        (s) => s.userAgent,
      ),
    ).toEqual(["mobile", "desktop"]);
  });
});

describe("runGroupCycle", () => {
  const logger = pino({ level: "silent" });
  let tmpDir: string;
  let store: DedupStore;
  let health: HealthState;
  let target: ReturnType<typeof vi.fn<DeliveryTarget>>;
  let claims: Set<string>;

  beforeEach(async () => {
    tmpDir = mkdtempSync(join(tmpdir(), "group-cycle-"));
    store = createDedupStore({ path: join(tmpDir, "seen.json"), maxRecords: 100, logger });
    await store.load();
    health = createHealthState();
    target = vi.fn<DeliveryTarget>().mockResolvedValue({ ok: true });
    claims = new Set();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function buildDeps(config: AppConfig, overrides: Partial<CycleDeps> = {}): CycleDeps {
    const worker = createDeliveryWorker({
      target,
      options: config.delivery,
      breaker: createCircuitBreaker(config.circuitBreaker),
      health,
      logger,
      sleep: async () => undefined,
    });
    return {
      config,
      store,
      worker,
      health,
      session: createFetchSession(config.fetch.sessionRotateAfter, () => 0),
      logger,
      claims,
      translator: null,
      sleep: async () => undefined,
      ...overrides,
    };
  }

  function configWith(group: Record<string, unknown>, extra: Record<string, unknown> = {}) {
    return createTestConfig({
      groups: [{ name: "crypto", schedule: "*/5 * * * *", ...group }],
      ...extra,
    });
  }

  it("should deliver relevant new articles in feed order and commit them", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN, BAKERY, ETHER]) },
    });
    const config = configWith({ sources: [rssSource("A", "https://a.example.com/rss")] });

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.delivered).toBe(2);
    expect(report.failed).toBe(0);
    expect(report.dropped).toEqual({ irrelevant: 1, stale: 0, duplicate: 0 });
    expect(target.mock.calls.map((call) => call[1])).toEqual([
      "₿ Bitcoin climbs above key level\n\nBitcoin rose sharply.",
      "₿ 🔷 Ethereum developers ship upgrade\n\nThe crypto network upgraded smoothly.",
    ]);
    expect(store.has(fingerprintArticle(BITCOIN.title, BITCOIN.link))).toBe(true);
    expect(store.has(fingerprintArticle(ETHER.title, ETHER.link))).toBe(true);
    expect(health.snapshot().lastSuccessfulFetchAt).not.toBeNull();
  });

  it("should commit an article only after the cycle that delivered it", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN]) },
    });
    const config = configWith({ sources: [rssSource("A", "https://a.example.com/rss")] });
    const deps = buildDeps(config);
    const id = fingerprintArticle(BITCOIN.title, BITCOIN.link);

    target.mockResolvedValueOnce({
      ok: false,
      errorKind: "permanent_rejection",
      error: "Bad Request: chat not found",
    });
    const first = await runGroupCycle(firstGroup(config), deps);

    expect(first.failed).toBe(1);
    expect(store.has(id)).toBe(false);
    expect(store.size()).toBe(0);

    const second = await runGroupCycle(firstGroup(config), deps);

    expect(second.delivered).toBe(1);
    expect(store.size()).toBe(1);
    expect(store.recent(10).map((record) => record.id)).toEqual([id]);
    expect(target).toHaveBeenCalledTimes(2);
  });

  it("should skip articles that are already stored", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN]) },
    });
    await store.commit(createTestArticle({ title: BITCOIN.title, link: BITCOIN.link }));
    const config = configWith({ sources: [rssSource("A", "https://a.example.com/rss")] });

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.dropped.duplicate).toBe(1);
    expect(report.queued).toBe(0);
    expect(target).not.toHaveBeenCalled();
  });

  it("should skip articles another group has claimed", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN, ETHER]) },
    });
    claims.add(fingerprintArticle(BITCOIN.title, BITCOIN.link));
    const config = configWith({ sources: [rssSource("A", "https://a.example.com/rss")] });

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.dropped.duplicate).toBe(1);
    expect(report.delivered).toBe(1);
    expect(claims.size).toBe(1);
  });

  it("should drop repeats of the same article across sources in one batch", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN]) },
      "https://b.example.com/rss": { status: 200, body: feed([BITCOIN, GOLD]) },
    });
    const config = configWith({
      sources: [
        rssSource("A", "https://a.example.com/rss"),
        rssSource("B", "https://b.example.com/rss"),
      ],
    });

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.dropped.duplicate).toBe(1);
    expect(report.delivered).toBe(2);
  });

  it("should apply the per-source cap and then the cycle cap", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN, ETHER, GOLD]) },
      "https://b.example.com/rss": {
        status: 200,
        body: feed([
          { ...GOLD, link: "https://news.example.com/commodities/gold-b" },
          { ...ETHER, link: "https://news.example.com/crypto/ether-b" },
        ]),
      },
    });
    const config = configWith(
      {
        sources: [
          rssSource("A", "https://a.example.com/rss", { maxArticlesPerCycle: 2 }),
          rssSource("B", "https://b.example.com/rss", { maxArticlesPerCycle: 2 }),
        ],
      },
      { pipeline: { maxArticlesPerCycle: 3 } },
    );

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.queued).toBe(3);
    expect(target.mock.calls.map((call) => call[1].split("\n")[0])).toEqual([
      "₿ Bitcoin climbs above key level",
      "₿ 🔷 Ethereum developers ship upgrade",
      "🛢️ 🥇 Gold edges higher on weak dollar",
    ]);
  });

  it("should keep delivering from healthy sources when one fails", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 503, body: "" },
      "https://b.example.com/rss": { status: 200, body: feed([GOLD]) },
    });
    const config = configWith({
      sources: [
        rssSource("A", "https://a.example.com/rss"),
        rssSource("B", "https://b.example.com/rss"),
      ],
    });

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.delivered).toBe(1);
    expect(report.sources[0]?.errors).toEqual([
      "https://a.example.com/rss: rejected: HTTP 503: Service Unavailable",
    ]);
    expect(health.snapshot().errors["fetch:rejected"]?.count).toBe(1);
  });

  it("should try fallback sources when the primaries return nothing", async () => {
    const fetchMock = stubFetch({
      "https://a.example.com/rss": { status: 503, body: "" },
      "https://backup.example.com/rss": { status: 200, body: feed([BITCOIN]) },
    });
    const config = configWith({
      sources: [rssSource("A", "https://a.example.com/rss")],
      fallbackSources: [rssSource("Backup", "https://backup.example.com/rss")],
    });

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.usedFallback).toBe(true);
    expect(report.delivered).toBe(1);
    expect(report.sources.map((source) => source.source)).toEqual(["A", "Backup"]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should not touch fallback sources when the primaries yield articles", async () => {
    const fetchMock = stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BAKERY]) },
      "https://backup.example.com/rss": { status: 200, body: feed([BITCOIN]) },
    });
    const config = configWith({
      sources: [rssSource("A", "https://a.example.com/rss")],
      fallbackSources: [rssSource("Backup", "https://backup.example.com/rss")],
    });

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.usedFallback).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should skip disabled sources", async () => {
    const fetchMock = stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN]) },
    });
    const config = configWith({
      sources: [rssSource("A", "https://a.example.com/rss", { enabled: false })],
    });

    const report = await runGroupCycle(firstGroup(config), buildDeps(config));

    expect(report.sources).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should stop queueing deliveries once shutdown is requested", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN, ETHER]) },
    });
    const controller = new AbortController();
    target.mockImplementation(async () => {
      controller.abort();
      return { ok: true };
    });
    const config = configWith({ sources: [rssSource("A", "https://a.example.com/rss")] });

    const report = await runGroupCycle(
      firstGroup(config),
      buildDeps(config, { signal: controller.signal }),
    );

    expect(report.delivered).toBe(1);
    expect(report.cancelled).toBe(true);
    expect(target).toHaveBeenCalledTimes(1);
  });

  it("should send the translated headline when translation is enabled", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN]) },
    });
    const translator = vi.fn<Translator>().mockResolvedValue("ارتفاع البيتكوين");
    const config = configWith(
      { sources: [rssSource("A", "https://a.example.com/rss")] },
      { translation: { enabled: true } },
    );

    await runGroupCycle(firstGroup(config), buildDeps(config, { translator }));

    expect(translator).toHaveBeenCalledWith(BITCOIN.title, "cryptocurrency news");
    expect(target).toHaveBeenCalledWith(
      "@test-channel",
      "₿ ارتفاع البيتكوين\n\nBitcoin rose sharply.",
      null,
    );
  });

  it("should report each phase in order", async () => {
    stubFetch({
      "https://a.example.com/rss": { status: 200, body: feed([BITCOIN]) },
    });
    const phases: Array<GroupPhase> = [];
    const config = configWith({ sources: [rssSource("A", "https://a.example.com/rss")] });

    await runGroupCycle(
      firstGroup(config),
      buildDeps(config, { onPhase: (phase) => phases.push(phase) }),
    );

    expect(phases).toEqual(["fetching", "filtering", "delivering"]);
  });
});
