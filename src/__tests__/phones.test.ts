import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CompletionIndex } from "../lib/completion-index";
import { SqliteDocumentStore } from "../lib/db";
import { buildPhoneRecord, ensurePhoneIndexes, persistPhoneRecord } from "../lib/phones";
import type { ListingItem, PhoneListEntry, PhoneRecord, SpecSheet } from "../lib/types";

const ITEM: ListingItem = {
  name: "X1",
  detailId: "acme_x1-100",
  detailUrl: "https://site.test/acme_x1-100.php",
  thumbnailUrl: null,
};

const SHEET: SpecSheet = {
  name: "Acme X1",
  categories: [
    { title: "Display", pairs: [{ key: "Size", value: "6.1 inches" }] },
    { title: "Tests", pairs: [{ key: "Performance", value: "fast" }] },
  ],
};

describe("buildPhoneRecord", () => {
  it("combines listing data, normalized sections and raw categories", () => {
    const draft = buildPhoneRecord(ITEM, "Acme", SHEET, "test-source");

    expect(draft).toMatchObject({
      detailId: "acme_x1-100",
      name: "Acme X1",
      brand: "Acme",
      url: "https://site.test/acme_x1-100.php",
      source: "test-source",
      display: { displayType: null, size: "6.1 inches", resolution: null, protection: null },
      battery: null,
    });
    expect(draft.rawCategories).toBe(SHEET.categories);
  });

  it("falls back to the listing name", () => {
    expect(buildPhoneRecord(ITEM, "Acme", { name: null, categories: [] }).name).toBe("X1");
  });
});

describe("persistPhoneRecord", () => {
  let store: SqliteDocumentStore;

  beforeEach(() => {
    store = SqliteDocumentStore.open(":memory:");
    ensurePhoneIndexes(store, "phones");
  });

  afterEach(() => {
    store.close();
  });

  it("bumps version and lastUpdatedAt without duplicating the record", () => {
    const draft = buildPhoneRecord(ITEM, "Acme", SHEET);
    const first = persistPhoneRecord(store, draft, "phones", new Date("2031-01-01T00:00:00.000Z"));
    const second = persistPhoneRecord(store, draft, "phones", new Date("2031-01-02T00:00:00.000Z"));

    expect(first.outcome).toBe("inserted");
    expect(second.outcome).toBe("updated");
    expect(store.count("phones")).toBe(1);

    const stored = store.findOne<PhoneRecord>("phones", "detailId", "acme_x1-100");
    expect(stored?.version).toBe(2);
    expect(stored?.firstSeenAt).toBe("2031-01-01T00:00:00.000Z");
    expect(stored?.lastUpdatedAt).toBe("2031-01-02T00:00:00.000Z");
    expect(stored?.display).toEqual(first.record.display);
  });
});

describe("CompletionIndex", () => {
  let store: SqliteDocumentStore;
  let index: CompletionIndex;

  beforeEach(() => {
    store = SqliteDocumentStore.open(":memory:");
    index = new CompletionIndex(store, "phone_list");
    index.ensureIndexes();
  });

  afterEach(() => {
    store.close();
  });

  it("records pending entries without completing them", () => {
    index.recordPending(ITEM, "Acme");

    expect(store.findOne<PhoneListEntry>("phone_list", "detailId", ITEM.detailId)?.isComplete).toBe(false);
    expect(new CompletionIndex(store, "phone_list").load()).toBe(0);
  });

  it("persists completion and reloads it", () => {
    index.recordPending(ITEM, "Acme", new Date("2031-01-01T00:00:00.000Z"));
    index.markComplete(ITEM, "Acme", new Date("2031-01-03T00:00:00.000Z"));

    const entry = store.findOne<PhoneListEntry>("phone_list", "detailId", ITEM.detailId);
    expect(entry).toMatchObject({ isComplete: true, createdAt: "2031-01-01T00:00:00.000Z", updatedAt: "2031-01-03T00:00:00.000Z" });

    const reloaded = new CompletionIndex(store, "phone_list");
    expect(reloaded.load()).toBe(1);
    expect(reloaded.has(ITEM.detailId)).toBe(true);
  });

  it("keeps a completed entry complete when it is recorded again", () => {
    index.markComplete(ITEM, "Acme");
    index.recordPending(ITEM, "Acme");

    expect(store.findOne<PhoneListEntry>("phone_list", "detailId", ITEM.detailId)?.isComplete).toBe(true);
  });

  it("claims each id once at a time", () => {
    expect(index.tryClaim("a", true)).toBe("claimed");
    expect(index.tryClaim("a", true)).toBe("in_flight");
    index.release("a");
    expect(index.tryClaim("a", true)).toBe("claimed");
  });

  it("reports completed ids only when skipping existing", () => {
    index.markComplete(ITEM, "Acme");

    expect(index.tryClaim(ITEM.detailId, true)).toBe("complete");
    expect(index.tryClaim(ITEM.detailId, false)).toBe("claimed");
  });
});
