import { config } from "./config";
import type { DocumentStore } from "./db";
import type { ListingItem, PhoneListEntry } from "./types";

export type ClaimResult = "claimed" | "complete" | "in_flight";

const KEY_FIELD = "detailId";

/**
 * Detail IDs already fully ingested, backed by the phone-list collection.
 * Membership checks and claims are synchronous, so concurrent workers on
 * the event loop can't both claim the same ID.
 */
export class CompletionIndex {
  private readonly completed = new Set<string>();
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly store: DocumentStore,
    private readonly collection: string = config.phoneListCollection
  ) {}

  ensureIndexes(): void {
    this.store.ensureIndex(this.collection, KEY_FIELD, { unique: true });
    this.store.ensureIndex(this.collection, "isComplete");
    this.store.ensureIndex(this.collection, "brand");
  }

  /** Replace the in-memory view with what the store holds; returns its size */
  load(): number {
    this.completed.clear();
    for (const id of this.store.findKeys(this.collection, KEY_FIELD, { isComplete: true })) {
      this.completed.add(id);
    }
    return this.completed.size;
  }

  get size(): number {
    return this.completed.size;
  }

  has(detailId: string): boolean {
    return this.completed.has(detailId);
  }

  tryClaim(detailId: string, skipExisting: boolean): ClaimResult {
    if (skipExisting && this.completed.has(detailId)) return "complete";
    if (this.inFlight.has(detailId)) return "in_flight";
    this.inFlight.add(detailId);
    return "claimed";
  }

  release(detailId: string): void {
    this.inFlight.delete(detailId);
  }

  /** Record the item in the phone list without changing its completion state */
  recordPending(item: ListingItem, brand: string, now: Date = new Date()): void {
    const existing = this.store.findOne<PhoneListEntry>(this.collection, KEY_FIELD, item.detailId);
    this.write(item, brand, existing?.isComplete ?? false, existing, now);
  }

  /** Only called after the phone record itself was persisted */
  markComplete(item: ListingItem, brand: string, now: Date = new Date()): void {
    const existing = this.store.findOne<PhoneListEntry>(this.collection, KEY_FIELD, item.detailId);
    this.write(item, brand, true, existing, now);
    this.completed.add(item.detailId);
    this.inFlight.delete(item.detailId);
  }

  private write(item: ListingItem, brand: string, isComplete: boolean, existing: PhoneListEntry | null, now: Date) {
    const timestamp = now.toISOString();
    const entry: PhoneListEntry = {
      detailId: item.detailId,
      name: item.name,
      brand,
      url: item.detailUrl,
      thumbnailUrl: item.thumbnailUrl,
      isComplete,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    this.store.upsert(this.collection, KEY_FIELD, item.detailId, entry);
  }
}
