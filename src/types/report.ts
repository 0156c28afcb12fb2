import type { CheapestStoreOutcome } from "./shopping";

export interface SupplyEntry {
  item: string;
  quantity: number;
}

export interface ComparisonEntry {
  index: number;
  name: string;
  total: number | null; // null when the store is missing items
  unavailableItems: string[];
}

export interface BreakdownLine {
  item: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

export interface CheapestStoreSummary {
  outcome: CheapestStoreOutcome;
  store: string | null;
  total: number | null;
  merged: SupplyEntry[];
}

export interface Savings {
  amount: number;
  percent: number;
}

export interface ShoppingReport {
  merged: SupplyEntry[];
  comparison: ComparisonEntry[];
  cheapest: CheapestStoreSummary & { breakdown: BreakdownLine[] };
  savings: Savings | null;
}
