import type { PantryItem } from "@kitchen-assistant/contracts";

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_ITEM_BONUS = 10;

/**
 * Whole days from the start of `asOf`'s UTC day to the expiration date.
 * Today is 0, tomorrow is 1, yesterday is -1.
 */
export function daysUntilExpiry(expirationDate: string, asOf: Date = new Date()): number {
  const expiry = Date.parse(`${expirationDate.slice(0, 10)}T00:00:00.000Z`);
  const reference = Date.UTC(asOf.getUTCFullYear(), asOf.getUTCMonth(), asOf.getUTCDate());
  return Math.ceil((expiry - reference) / DAY_MS);
}

export function isExpiringWithin(item: PantryItem, windowDays: number, asOf: Date): boolean {
  if (!item.expirationDate) {
    return false;
  }
  const days = daysUntilExpiry(item.expirationDate, asOf);
  return days >= 0 && days <= windowDays;
}

/** Urgency bonus for cooking with one pantry item; expired items earn nothing. */
export function expirationBonusForItem(item: PantryItem, windowDays: number, asOf: Date): number {
  if (!item.expirationDate || !isExpiringWithin(item, windowDays, asOf)) {
    return 0;
  }
  const days = daysUntilExpiry(item.expirationDate, asOf);
  return Math.min(MAX_ITEM_BONUS, MAX_ITEM_BONUS / Math.max(1, days));
}

export function expiringSoon(
  items: PantryItem[],
  windowDays: number,
  asOf: Date,
): Array<{ name: string; daysRemaining: number }> {
  return items
    .filter((item) => item.quantity > 0 && isExpiringWithin(item, windowDays, asOf))
    .map((item) => ({
      name: item.name,
      daysRemaining: item.expirationDate ? daysUntilExpiry(item.expirationDate, asOf) : 0,
    }))
    .toSorted(
      (left, right) => left.daysRemaining - right.daysRemaining || left.name.localeCompare(right.name),
    );
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}
