import type { Store } from "../core/store";

export type SupplyList = Map<string, number>;

export type PriceLookup =
  | { available: true; price: number }
  | { available: false };

export interface StoreTotal {
  total: number; // Partial when `missing` is not empty
  missing: string[];
}

export interface StoreComparison {
  total: number;
  unavailableItems: string[];
}

export interface IndexedStoreComparison extends StoreComparison {
  index: number; // Registration order, stable across duplicate names
  name: string;
}

export type CheapestStoreOutcome =
  | "no-demand"
  | "no-stores"
  | "no-feasible-store"
  | "found";

export type CheapestStoreResult =
  | { outcome: "no-demand"; store: null; total: 0; merged: SupplyList }
  | { outcome: "no-stores"; store: null; total: 0; merged: SupplyList }
  | {
      outcome: "no-feasible-store";
      store: null;
      total: number; // Infinity
      merged: SupplyList;
    }
  | { outcome: "found"; store: Store; total: number; merged: SupplyList };
