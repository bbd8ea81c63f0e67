import { config } from "./config";
import type { DocumentStore, UpsertOutcome } from "./db";
import { normalize } from "./normalization";
import type { ListingItem, PhoneRecord, SpecSheet } from "./types";

/** Everything of a PhoneRecord except the lifecycle fields the store owns */
export type PhoneDraft = Omit<PhoneRecord, "firstSeenAt" | "lastUpdatedAt" | "version">;

export const PHONE_KEY_FIELD = "detailId";

export function buildPhoneRecord(
  item: ListingItem,
  brand: string,
  sheet: SpecSheet,
  source: string = config.sourceTag
): PhoneDraft {
  return {
    detailId: item.detailId,
    name: sheet.name ?? item.name,
    brand,
    url: item.detailUrl,
    thumbnailUrl: item.thumbnailUrl,
    source,
    ...normalize(sheet.categories),
    rawCategories: sheet.categories,
  };
}

export interface PersistResult {
  record: PhoneRecord;
  outcome: UpsertOutcome;
}

/**
 * Upsert by detailId. firstSeenAt survives re-ingestion; version goes up
 * by one on every write.
 */
export function persistPhoneRecord(
  store: DocumentStore,
  draft: PhoneDraft,
  collection: string = config.phonesCollection,
  now: Date = new Date()
): PersistResult {
  const existing = store.findOne<PhoneRecord>(collection, PHONE_KEY_FIELD, draft.detailId);
  const timestamp = now.toISOString();

  const record: PhoneRecord = {
    ...draft,
    firstSeenAt: existing?.firstSeenAt ?? timestamp,
    lastUpdatedAt: timestamp,
    version: (existing?.version ?? 0) + 1,
  };

  const outcome = store.upsert(collection, PHONE_KEY_FIELD, draft.detailId, record);
  return { record, outcome };
}

/** Indexes used by lookups and reporting on the phones collection */
export function ensurePhoneIndexes(store: DocumentStore, collection: string = config.phonesCollection): void {
  store.ensureIndex(collection, PHONE_KEY_FIELD, { unique: true });
  store.ensureIndex(collection, "brand");
  store.ensureIndex(collection, "lastUpdatedAt");
  store.ensureIndex(collection, ["brand", "name"]);
}
