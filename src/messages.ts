import type { ListingRecord } from "./types.js";

/** 1750000 → "1,750,000" */
export function formatThousands(n: number): string {
  const [whole, fraction] = String(n).split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return fraction ? `${grouped}.${fraction}` : grouped;
}

/** Escape characters that Telegram's legacy Markdown treats as markup. */
export function escapeMarkdown(s: string): string {
  return s.replace(/([_*`[])/g, "\\$1");
}

function formatCheckedAt(now: Date): string {
  return `${now.toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

function bedroomsLine(record: ListingRecord): string {
  const beds = record.bedrooms === 0 ? "Studio" : `${record.bedrooms ?? "?"} BR`;
  return record.bathrooms != null ? `${beds} | 🛁 ${record.bathrooms} BA` : beds;
}

export function formatListingMessage(record: ListingRecord, area: string, now: Date): string {
  const price = record.priceDisplay || `${formatThousands(record.price)} AED`;
  const size = record.sizeDisplay || `${formatThousands(record.sizeSqft)} sqft`;
  const lines = [
    `🏠 *New listing in ${escapeMarkdown(area)}!*`,
    "",
    escapeMarkdown(record.title),
    "",
    `💰 *Price:* ${escapeMarkdown(price)}`,
    `📐 *Size:* ${escapeMarkdown(size)}`,
  ];
  if (record.building) lines.push(`🏢 *Building:* ${escapeMarkdown(record.building)}`);
  lines.push(`🛏️ *Rooms:* ${bedroomsLine(record)}`);
  if (record.location) lines.push(`📍 *Location:* ${escapeMarkdown(record.location)}`);
  lines.push("", `🔗 [Open listing](${record.url})`, "", `⏰ Found: ${formatCheckedAt(now)}`);
  return lines.join("\n");
}

export function formatEmptyRunMessage(area: string, now: Date): string {
  return `🏠 ${escapeMarkdown(area)} check: no new listings found.\n\n⏰ Checked: ${formatCheckedAt(now)}`;
}
