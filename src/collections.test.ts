import { describe, expect, it } from "vitest";
import { buildCollections, compareCollectionIds } from "./collections.js";
import { extractItemIndex } from "./hierarchy.js";
import type { ContentRecord } from "./types.js";

function makeRecord(path: string, overrides: Partial<ContentRecord> = {}): ContentRecord {
  const [collectionId, file] = path.split("/");
  const slug = file.replace(/\.md$/, "");
  return {
    path,
    collectionId,
    itemIndex: extractItemIndex(slug),
    slug,
    title: slug,
    description: "",
    date: null,
    draft: false,
    weight: 0,
    template: null,
    extra: {},
    dialect: "yaml",
    ambiguousOrdering: false,
    body: "",
    ...overrides,
  };
}

describe("compareCollectionIds", () => {
  it("orders by the number in the id", () => {
    expect(["day 13", "day 2", "day 1"].sort(compareCollectionIds)).toEqual(["day 1", "day 2", "day 13"]);
  });

  it("puts ids without a number last", () => {
    expect(["extras", "day 2", "appendix"].sort(compareCollectionIds)).toEqual(["day 2", "appendix", "extras"]);
  });

  it("falls back to text on equal numbers", () => {
    expect(["week 1", "day 1"].sort(compareCollectionIds)).toEqual(["day 1", "week 1"]);
  });
});

describe("buildCollections", () => {
  it("groups records by collection and orders both levels", () => {
    const { corpus, issues } = buildCollections([
      makeRecord("day 13/chapter-2.md"),
      makeRecord("day 2/chapter-3.md"),
      makeRecord("day 13/chapter-1.md"),
      makeRecord("day 2/chapter-1.md"),
    ]);

    expect(corpus.collections.map((c) => [c.id, c.records.map((r) => r.slug)])).toEqual([
      ["day 2", ["chapter-1", "chapter-3"]],
      ["day 13", ["chapter-1", "chapter-2"]],
    ]);
    expect(issues).toEqual([]);
  });

  it("keeps drafts in the collection", () => {
    const { corpus } = buildCollections([makeRecord("day 1/chapter-1.md", { draft: true })]);
    expect(corpus.collections[0].records).toHaveLength(1);
  });

  it("keeps known collections that lost every record", () => {
    const { corpus } = buildCollections([makeRecord("day 1/chapter-1.md")], ["day 1", "day 3"]);
    expect(corpus.collections.map((c) => [c.id, c.records.length])).toEqual([
      ["day 1", 1],
      ["day 3", 0],
    ]);
  });

  it("flags every record sharing a chapter number", () => {
    const first = makeRecord("day 4/chapter-2.md", { date: "2024-05-02" });
    const second = makeRecord("day 4/chapter-02.md", { date: "2024-05-01" });
    const third = makeRecord("day 4/chapter-3.md");

    const { corpus, issues } = buildCollections([first, second, third]);
    const records = corpus.collections[0].records;

    expect(records.map((r) => [r.slug, r.ambiguousOrdering])).toEqual([
      ["chapter-02", true],
      ["chapter-2", true],
      ["chapter-3", false],
    ]);
    expect(issues).toEqual([
      {
        kind: "AmbiguousOrdering",
        severity: "warning",
        path: "day 4/chapter-02.md",
        message: "chapter number 2 is shared with day 4/chapter-2.md; ordered by date, then slug",
      },
      {
        kind: "AmbiguousOrdering",
        severity: "warning",
        path: "day 4/chapter-2.md",
        message: "chapter number 2 is shared with day 4/chapter-02.md; ordered by date, then slug",
      },
    ]);
    expect(first.ambiguousOrdering).toBe(false);
  });

  it("does not flag records without a chapter number", () => {
    const { issues } = buildCollections([makeRecord("day 1/intro.md"), makeRecord("day 1/outro.md")]);
    expect(issues).toEqual([]);
  });

  it("returns an empty corpus for no records", () => {
    expect(buildCollections([])).toEqual({ corpus: { collections: [] }, issues: [] });
  });
});
