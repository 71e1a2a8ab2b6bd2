import type { PantryDelta, PantryItem } from "@kitchen-assistant/contracts";
import { convertQuantity, isMeasureUnit, normalizeIngredientName, normalizeUnit } from "./ingredients.js";

export class PantryDeltaError extends Error {
  readonly itemName: string;
  readonly available: number;
  readonly change: number;

  constructor(itemName: string, available: number, change: number, message?: string) {
    super(message ?? `cannot remove ${Math.abs(change)} ${itemName}: only ${available} in pantry`);
    this.name = "PantryDeltaError";
    this.itemName = itemName;
    this.available = available;
    this.change = change;
  }
}

function roundQuantity(quantity: number): number {
  return Number.parseFloat(quantity.toFixed(3));
}

/**
 * The delta's change expressed in the stored item's unit. A delta without a
 * unit counts in the item's unit; measures convert within mass or volume.
 */
function changeInStoredUnit(delta: PantryDelta, existing: PantryItem | undefined): number {
  if (!existing || !delta.unit || delta.unit === existing.unit) {
    return delta.change;
  }
  if (!existing.unit && !isMeasureUnit(delta.unit)) {
    return delta.change;
  }

  const converted = existing.unit ? convertQuantity(delta.change, delta.unit, existing.unit) : undefined;
  if (converted === undefined) {
    const stored = existing.unit ?? "a plain count";
    throw new PantryDeltaError(
      delta.name,
      existing.quantity,
      delta.change,
      `cannot combine ${delta.unit} with ${stored} of ${delta.name} in pantry`,
    );
  }
  return converted;
}

export function normalizePantryDelta(delta: PantryDelta): PantryDelta {
  const normalized: PantryDelta = {
    name: normalizeIngredientName(delta.name),
    change: delta.change,
  };
  const unit = normalizeUnit(delta.unit);
  if (unit) {
    normalized.unit = unit;
  }
  if (delta.expirationDate) {
    normalized.expirationDate = delta.expirationDate;
  }
  if (delta.removeAll) {
    normalized.removeAll = true;
  }
  return normalized;
}

/**
 * Applies signed deltas in order and returns the new inventory sorted by
 * name. Throws {@link PantryDeltaError} without applying anything when a
 * delta would take an item below zero or its unit cannot be converted to the
 * stored one. Items reaching zero are removed.
 */
export function applyPantryDeltas(items: PantryItem[], deltas: PantryDelta[]): PantryItem[] {
  const working = new Map<string, PantryItem>();
  for (const item of items) {
    working.set(item.name, { ...item });
  }

  for (const rawDelta of deltas) {
    const delta = normalizePantryDelta(rawDelta);
    if (!delta.name) {
      continue;
    }

    const existing = working.get(delta.name);
    if (delta.removeAll) {
      working.delete(delta.name);
      continue;
    }

    const available = existing?.quantity ?? 0;
    const change = changeInStoredUnit(delta, existing);
    const next = roundQuantity(available + change);
    if (next < 0) {
      throw new PantryDeltaError(delta.name, available, roundQuantity(change));
    }
    if (next === 0) {
      working.delete(delta.name);
      continue;
    }

    const item: PantryItem = { name: delta.name, quantity: next };
    const unit = existing?.unit ?? delta.unit;
    if (unit) {
      item.unit = unit;
    }
    const expirationDate = delta.expirationDate ?? existing?.expirationDate;
    if (expirationDate) {
      item.expirationDate = expirationDate;
    }
    working.set(delta.name, item);
  }

  return [...working.values()].toSorted((left, right) => left.name.localeCompare(right.name));
}

export function inStock(items: PantryItem[]): PantryItem[] {
  return items.filter((item) => item.quantity > 0);
}
