import type { SmartShoppingList } from "../core/smartShoppingList";
import type { CheapestStoreResult, SupplyList } from "../types/shopping";
import type {
  BreakdownLine,
  CheapestStoreSummary,
  ComparisonEntry,
  Savings,
  ShoppingReport,
  SupplyEntry,
} from "../types/report";

// Code point ordering, independent of the host locale
export function compareItemNames(a: string, b: string) {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

export function toSupplyEntries(supplies: SupplyList): SupplyEntry[] {
  return Array.from(supplies, ([item, quantity]) => ({ item, quantity }));
}

export function toSortedSupplyEntries(supplies: SupplyList): SupplyEntry[] {
  return toSupplyEntries(supplies).sort((a, b) =>
    compareItemNames(a.item, b.item)
  );
}

// JSON has no Infinity; an unavailable total goes out as null
export function toWireTotal(total: number): number | null {
  return Number.isFinite(total) ? total : null;
}

export function summarizeCheapest(result: CheapestStoreResult): CheapestStoreSummary {
  return {
    outcome: result.outcome,
    store: result.store ? result.store.name : null,
    total: toWireTotal(result.total),
    merged: toSortedSupplyEntries(result.merged),
  };
}

export function getComparisonByName(list: SmartShoppingList) {
  const comparison = list.getPriceComparison();

  return Object.fromEntries(
    Object.entries(comparison).map(([name, entry]) => [
      name,
      { total: toWireTotal(entry.total), unavailableItems: entry.unavailableItems },
    ])
  );
}

function buildBreakdown(result: CheapestStoreResult): BreakdownLine[] {
  if (result.outcome !== "found") {
    return [];
  }

  const { store } = result;
  return toSortedSupplyEntries(result.merged).map(({ item, quantity }) => {
    const unitPrice = store.getPrice(item);
    return { item, quantity, unitPrice, subtotal: unitPrice * quantity };
  });
}

function calculateSavings(
  result: CheapestStoreResult,
  comparison: ComparisonEntry[]
): Savings | null {
  if (result.outcome !== "found") {
    return null;
  }

  const feasibleTotals = comparison.flatMap((entry) =>
    entry.total === null ? [] : [entry.total]
  );
  if (feasibleTotals.length < 2) {
    return null;
  }

  const maxTotal = Math.max(...feasibleTotals);
  const amount = maxTotal - result.total;
  if (amount <= 0) {
    return null;
  }

  return { amount, percent: (amount / maxTotal) * 100 };
}

export function buildShoppingReport(list: SmartShoppingList): ShoppingReport {
  const cheapest = list.findCheapestStore();
  const comparison: ComparisonEntry[] = list.compareStores().map((entry) => ({
    index: entry.index,
    name: entry.name,
    total: toWireTotal(entry.total),
    unavailableItems: entry.unavailableItems,
  }));

  return {
    merged: toSortedSupplyEntries(list.mergeSupplies()),
    comparison,
    cheapest: { ...summarizeCheapest(cheapest), breakdown: buildBreakdown(cheapest) },
    savings: calculateSavings(cheapest, comparison),
  };
}
