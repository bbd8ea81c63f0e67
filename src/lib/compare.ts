import type { RawCategory, SpecSheet } from "./types";

/**
 * Value of the first pair whose key contains `name` (case-insensitive),
 * optionally only within the category titled `category`.
 */
export function findSpec(categories: RawCategory[], name: string, category?: string): string | null {
  const needle = name.toLowerCase();
  const title = category?.toLowerCase();
  for (const cat of categories) {
    if (title !== undefined && cat.title.toLowerCase() !== title) continue;
    for (const pair of cat.pairs) {
      if (pair.key.toLowerCase().includes(needle)) return pair.value;
    }
  }
  return null;
}

/** Human readable dump of a spec sheet */
export function formatSpecSheet(sheet: SpecSheet): string {
  const lines: string[] = [];
  if (sheet.name) lines.push(`Name: ${sheet.name}`);
  lines.push("", "Specifications:");
  for (const category of sheet.categories) {
    lines.push("", `[${category.title}]`);
    for (const { key, value } of category.pairs) {
      lines.push(`  ${key}: ${value.replace(/\n/g, "; ")}`);
    }
  }
  return lines.join("\n") + "\n";
}

export interface ComparisonRow {
  label: string;
  first: string;
  second: string;
}

const COMPARED_SPECS: { label: string; category: string; key: string }[] = [
  { label: "Display", category: "display", key: "size" },
  { label: "Chipset", category: "platform", key: "chipset" },
  { label: "Memory", category: "memory", key: "internal" },
  { label: "Battery", category: "battery", key: "type" },
  { label: "Camera", category: "main camera", key: "" },
  { label: "Price", category: "misc", key: "price" },
];

export function compareRows(first: SpecSheet, second: SpecSheet): ComparisonRow[] {
  return COMPARED_SPECS.map(({ label, category, key }) => ({
    label,
    first: findSpec(first.categories, key, category) ?? "N/A",
    second: findSpec(second.categories, key, category) ?? "N/A",
  }));
}

export function comparePhones(first: SpecSheet, second: SpecSheet): string {
  const firstName = first.name ?? "Phone 1";
  const secondName = second.name ?? "Phone 2";
  const lines = [`Comparing: ${firstName} vs ${secondName}`, "=".repeat(50)];

  for (const row of compareRows(first, second)) {
    lines.push("", `${row.label.toUpperCase()}:`, `  ${firstName}: ${row.first}`, `  ${secondName}: ${row.second}`);
  }
  return lines.join("\n") + "\n";
}
