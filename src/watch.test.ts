import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildCollections } from "./collections.js";
import { loadConfig } from "./config.js";
import type { ScanResult } from "./scanner.js";
import { CorpusStore } from "./store.js";
import type { ContentRecord } from "./types.js";
import { createRescan, parseArgs, type SnapshotPublisher } from "./watch.js";

const config = loadConfig({});

function makeResult(title: string): ScanResult {
  const record: ContentRecord = {
    path: "day 1/chapter-1.md",
    collectionId: "day 1",
    itemIndex: 1,
    slug: "chapter-1",
    title,
    description: "",
    date: null,
    draft: false,
    weight: 0,
    template: null,
    extra: {},
    dialect: "yaml",
    ambiguousOrdering: false,
    body: "",
  };
  return {
    corpus: buildCollections([record]).corpus,
    report: { scanned: 1, records: 1, issues: [] },
  };
}

describe("parseArgs", () => {
  it("reads the schedule and passes the rest to the scan options", () => {
    const options = parseArgs(["--schedule", "0 * * * *", "book", "--drafts"], config);
    expect(options).toMatchObject({ schedule: "0 * * * *", root: "book", includeDrafts: true });
  });

  it("defaults to the configured schedule", () => {
    expect(parseArgs([], config).schedule).toBe("*/5 * * * *");
    expect(parseArgs([], { ...config, RESCAN_SCHEDULE: "0 0 * * *" }).schedule).toBe("0 0 * * *");
  });
});

describe("createRescan", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("publishes the first snapshot", async () => {
    const publish = vi.fn<SnapshotPublisher>(async () => {});
    const rescan = createRescan(new CorpusStore(async () => makeResult("A")), publish);

    const snapshot = await rescan();

    expect(publish).toHaveBeenCalledWith(snapshot);
    expect(console.log).toHaveBeenCalledWith("[WATCH] Published generation 1: 1 record in 1 collection, 0 issues");
  });

  it("skips publishing when nothing changed", async () => {
    const publish = vi.fn<SnapshotPublisher>(async () => {});
    const rescan = createRescan(new CorpusStore(async () => makeResult("A")), publish);

    await rescan();
    await rescan();

    expect(publish).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith("[WATCH] No changes (generation 2)");
  });

  it("publishes again when the content changed", async () => {
    let title = "A";
    const publish = vi.fn<SnapshotPublisher>(async () => {});
    const rescan = createRescan(new CorpusStore(async () => makeResult(title)), publish);

    await rescan();
    title = "B";
    await rescan();

    expect(publish).toHaveBeenCalledTimes(2);
  });

  it("rewrites unchanged content after a failed write", async () => {
    let title = "A";
    let diskFull = false;
    const written: string[] = [];
    const publish: SnapshotPublisher = async (snapshot) => {
      if (diskFull) throw new Error("no space left on device");
      written.push(snapshot.corpus.collections[0].records[0].title);
    };
    const rescan = createRescan(new CorpusStore(async () => makeResult(title)), publish);

    await rescan();
    title = "B";
    diskFull = true;
    await expect(rescan()).resolves.toBeNull();
    diskFull = false;
    await rescan();

    expect(written).toEqual(["A", "B"]);
    expect(console.error).toHaveBeenCalledWith(
      "[WATCH] Writing generation 2 failed: no space left on device (retrying on the next rescan)",
    );
  });

  it("keeps the current snapshot when a rescan fails", async () => {
    let fail = false;
    const store = new CorpusStore(async () => {
      if (fail) throw new Error("root vanished");
      return makeResult("A");
    });
    const rescan = createRescan(store, async () => {});

    const first = await rescan();
    fail = true;

    await expect(rescan()).resolves.toBeNull();
    expect(store.current()).toBe(first);
    expect(console.error).toHaveBeenCalledWith("[WATCH] Rescan failed: root vanished (keeping generation 1)");
  });

  it("reports when there is no corpus yet", async () => {
    const rescan = createRescan(
      new CorpusStore(async () => {
        throw new Error("root vanished");
      }),
      async () => {},
    );

    await rescan();

    expect(console.error).toHaveBeenCalledWith("[WATCH] Rescan failed: root vanished (keeping no corpus yet)");
  });

  it("logs a superseded scan without failing", async () => {
    const resolvers: Array<(result: ScanResult) => void> = [];
    const store = new CorpusStore(
      () =>
        new Promise<ScanResult>((resolve) => {
          resolvers.push(resolve);
        }),
    );
    const publish = vi.fn<SnapshotPublisher>(async () => {});
    const rescan = createRescan(store, publish);

    const older = rescan();
    const newer = rescan();
    resolvers[1](makeResult("new"));
    resolvers[0](makeResult("old"));

    await expect(older).resolves.toBeNull();
    await expect(newer).resolves.toMatchObject({ generation: 2 });
    expect(console.log).toHaveBeenCalledWith("[WATCH] Scan superseded; keeping the current corpus");
    expect(publish).toHaveBeenCalledTimes(1);
  });
});
