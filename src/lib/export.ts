import { existsSync, mkdirSync, writeFileSync } from "fs";
import path from "path";
import type { Brand, ListingItem } from "./types";

export interface BrandSnapshot extends Brand {
  items: ListingItem[];
}

/** Pretty-printed JSON, same field names as the stored documents */
export function writeSnapshot(filePath: string, data: unknown): string {
  const resolved = path.resolve(process.cwd(), filePath);
  const dir = path.dirname(resolved);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(resolved, JSON.stringify(data, null, 2) + "\n", "utf-8");
  return resolved;
}

export function snapshotFileName(prefix: string, now: Date = new Date()): string {
  return `${prefix}-${now.toISOString().replace(/[:.]/g, "-")}.json`;
}
