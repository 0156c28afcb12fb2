import type { Office } from "./office";
import type { Store } from "./store";
import { UNAVAILABLE_PRICE } from "../types/constants";
import type {
  CheapestStoreResult,
  IndexedStoreComparison,
  StoreComparison,
  StoreTotal,
  SupplyList,
} from "../types/shopping";

/**
 * Consolidates the demand of every registered office and prices it against
 * every registered store. Offices and stores are kept in insertion order;
 * duplicates (by name or instance) are tracked independently.
 */
export class SmartShoppingList {
  private readonly offices: Office[] = [];
  private readonly stores: Store[] = [];

  addOffice(office: Office) {
    this.offices.push(office);
  }

  addStore(store: Store) {
    this.stores.push(store);
  }

  getOffices(): readonly Office[] {
    return this.offices;
  }

  getStores(): readonly Store[] {
    return this.stores;
  }

  mergeSupplies(): SupplyList {
    const merged: SupplyList = new Map();
    for (const office of this.offices) {
      for (const [item, quantity] of office.getSupplies()) {
        merged.set(item, (merged.get(item) ?? 0) + quantity);
      }
    }
    return merged;
  }

  /**
   * Prices `supplies` at `store`. Items the store does not sell are listed in
   * `missing` (in the order they appear in `supplies`) and left out of
   * `total`, so the total is only meaningful when `missing` is empty.
   */
  calculateStoreTotal(store: Store, supplies: SupplyList): StoreTotal {
    let total = 0;
    const missing: string[] = [];

    for (const [item, quantity] of supplies) {
      const lookup = store.lookupPrice(item);
      if (!lookup.available) {
        missing.push(item);
        continue;
      }
      total += lookup.price * quantity;
    }

    return { total, missing };
  }

  findCheapestStore(): CheapestStoreResult {
    const merged = this.mergeSupplies();

    if (merged.size === 0) {
      return { outcome: "no-demand", store: null, total: 0, merged: new Map() };
    }

    if (this.stores.length === 0) {
      return { outcome: "no-stores", store: null, total: 0, merged };
    }

    let cheapest: { store: Store; total: number } | null = null;

    for (const store of this.stores) {
      const { total, missing } = this.calculateStoreTotal(store, merged);

      // Only stores that carry every item qualify; ties keep the earlier store
      if (missing.length === 0 && (cheapest === null || total < cheapest.total)) {
        cheapest = { store, total };
      }
    }

    if (cheapest === null) {
      return {
        outcome: "no-feasible-store",
        store: null,
        total: UNAVAILABLE_PRICE,
        merged,
      };
    }

    return { outcome: "found", store: cheapest.store, total: cheapest.total, merged };
  }

  /**
   * Per-store comparison keyed by store name. Stores sharing a name overwrite
   * each other here (the last registered wins); use `compareStores` when
   * every registered store must appear.
   */
  getPriceComparison(): Record<string, StoreComparison> {
    // No prototype, so any store name (even "__proto__") becomes an own key
    const comparison: Record<string, StoreComparison> = Object.create(null);
    for (const entry of this.compareStores()) {
      comparison[entry.name] = {
        total: entry.total,
        unavailableItems: entry.unavailableItems,
      };
    }
    return comparison;
  }

  compareStores(): IndexedStoreComparison[] {
    const merged = this.mergeSupplies();

    return this.stores.map((store, index) => {
      const { total, missing } = this.calculateStoreTotal(store, merged);
      return {
        index,
        name: store.name,
        total: missing.length > 0 ? UNAVAILABLE_PRICE : total,
        unavailableItems: missing,
      };
    });
  }
}
