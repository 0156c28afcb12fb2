import { beforeEach, describe, it, expect } from "vitest";
import { SmartShoppingList } from "../../../src/core/smartShoppingList";
import type { Store } from "../../../src/core/store";
import { makeOffice, makeStore } from "../../helpers/fixtures";

describe("SmartShoppingList", () => {
  let list: SmartShoppingList;
  let storeA: Store;
  let storeB: Store;

  beforeEach(() => {
    list = new SmartShoppingList();
    storeA = makeStore("StoreA", { Pens: 1.0, Paper: 5.0, Folders: 0.5 });
    storeB = makeStore("StoreB", { Pens: 1.5, Paper: 4.0, Folders: 0.75 });
  });

  function addBothOffices() {
    list.addOffice(makeOffice("Office A", { Pens: 10, Paper: 5 }));
    list.addOffice(makeOffice("Office B", { Pens: 5, Folders: 10 }));
  }

  describe("mergeSupplies", () => {
    it("sums quantities across offices", () => {
      addBothOffices();
      expect([...list.mergeSupplies()]).toEqual([
        ["Pens", 15],
        ["Paper", 5],
        ["Folders", 10],
      ]);
    });

    it("gives the same totals regardless of office order", () => {
      list.addOffice(makeOffice("Office B", { Pens: 5, Folders: 10 }));
      list.addOffice(makeOffice("Office A", { Pens: 10, Paper: 5 }));

      const merged = list.mergeSupplies();
      expect(merged.get("Pens")).toBe(15);
      expect(merged.get("Paper")).toBe(5);
      expect(merged.get("Folders")).toBe(10);
    });

    it("is empty without offices", () => {
      expect(list.mergeSupplies().size).toBe(0);
    });

    it("is empty when every office is empty", () => {
      list.addOffice(makeOffice("Empty 1", {}));
      list.addOffice(makeOffice("Empty 2", {}));
      expect(list.mergeSupplies().size).toBe(0);
    });

    it("counts the same office instance each time it is added", () => {
      const office = makeOffice("Office A", { Pens: 4 });
      list.addOffice(office);
      list.addOffice(office);
      expect(list.mergeSupplies().get("Pens")).toBe(8);
    });
  });

  describe("calculateStoreTotal", () => {
    it("totals price times quantity for every item", () => {
      list.addOffice(makeOffice("Office A", { Pens: 10, Paper: 5 }));
      expect(list.calculateStoreTotal(storeA, list.mergeSupplies())).toEqual({
        total: 35,
        missing: [],
      });
    });

    it("leaves unsold items out of the total and lists them in order", () => {
      const supplies = new Map([
        ["Staplers", 2],
        ["Pens", 10],
        ["Markers", 3],
      ]);
      expect(list.calculateStoreTotal(storeA, supplies)).toEqual({
        total: 10,
        missing: ["Staplers", "Markers"],
      });
    });

    it("returns zero and nothing missing for empty supplies", () => {
      expect(list.calculateStoreTotal(storeA, new Map())).toEqual({
        total: 0,
        missing: [],
      });
    });
  });

  describe("findCheapestStore", () => {
    it("picks the store with the lowest total", () => {
      addBothOffices();
      list.addStore(storeA);
      list.addStore(storeB);

      const result = list.findCheapestStore();

      expect(result.outcome).toBe("found");
      expect(result.store).toBe(storeA);
      expect(result.total).toBe(45);
      expect([...result.merged]).toEqual([
        ["Pens", 15],
        ["Paper", 5],
        ["Folders", 10],
      ]);
    });

    it("reports no demand with a zero total and empty list", () => {
      list.addStore(storeA);

      const result = list.findCheapestStore();

      expect(result.outcome).toBe("no-demand");
      expect(result.store).toBeNull();
      expect(result.total).toBe(0);
      expect(result.merged.size).toBe(0);
    });

    it("reports no stores but still returns the merged list", () => {
      list.addOffice(makeOffice("Office A", { Pens: 10, Paper: 5 }));

      const result = list.findCheapestStore();

      expect(result.outcome).toBe("no-stores");
      expect(result.store).toBeNull();
      expect(result.total).toBe(0);
      expect(result.merged.size).toBe(2);
    });

    it("skips stores that are missing items even when cheaper", () => {
      addBothOffices();
      list.addStore(makeStore("Cheap but partial", { Pens: 0.1, Paper: 0.1 }));
      list.addStore(storeB);

      const result = list.findCheapestStore();

      expect(result.store).toBe(storeB);
      expect(result.total).toBe(50);
    });

    it("returns Infinity when no store carries everything", () => {
      addBothOffices();
      list.addStore(makeStore("Pens only", { Pens: 1 }));
      list.addStore(makeStore("Paper only", { Paper: 1 }));

      const result = list.findCheapestStore();

      expect(result.outcome).toBe("no-feasible-store");
      expect(result.store).toBeNull();
      expect(result.total).toBe(Number.POSITIVE_INFINITY);
      expect(result.merged.size).toBe(3);
    });

    it("keeps the first registered store on a tie", () => {
      list.addOffice(makeOffice("Office A", { Pens: 2 }));
      const first = makeStore("First", { Pens: 3 });
      const second = makeStore("Second", { Pens: 3 });
      list.addStore(first);
      list.addStore(second);

      expect(list.findCheapestStore().store).toBe(first);
    });
  });

  describe("getPriceComparison", () => {
    it("reports each store's total keyed by name", () => {
      list.addOffice(makeOffice("Office A", { Pens: 10, Paper: 5 }));
      list.addStore(storeA);
      list.addStore(storeB);

      expect({ ...list.getPriceComparison() }).toEqual({
        StoreA: { total: 35, unavailableItems: [] },
        StoreB: { total: 35, unavailableItems: [] },
      });
    });

    it("reports Infinity and every item for a store that sells none of them", () => {
      addBothOffices();
      list.addStore(makeStore("Hardware", { Hammers: 12 }));

      expect({ ...list.getPriceComparison() }).toEqual({
        Hardware: {
          total: Number.POSITIVE_INFINITY,
          unavailableItems: ["Pens", "Paper", "Folders"],
        },
      });
    });

    it("lets a later store overwrite an earlier one with the same name", () => {
      list.addOffice(makeOffice("Office A", { Pens: 2 }));
      list.addStore(makeStore("Depot", { Pens: 1 }));
      list.addStore(makeStore("Depot", { Pens: 4 }));

      expect({ ...list.getPriceComparison() }).toEqual({
        Depot: { total: 8, unavailableItems: [] },
      });
    });

    it("keeps a store whose name matches an object property", () => {
      list.addOffice(makeOffice("Office A", { Pens: 2 }));
      list.addStore(makeStore("__proto__", { Pens: 1 }));
      list.addStore(makeStore("constructor", {}));

      const comparison = list.getPriceComparison();

      expect(Object.keys(comparison)).toEqual(["__proto__", "constructor"]);
      expect(Object.getOwnPropertyDescriptor(comparison, "__proto__")?.value).toEqual({
        total: 2,
        unavailableItems: [],
      });
      expect(comparison["constructor"]).toEqual({
        total: Number.POSITIVE_INFINITY,
        unavailableItems: ["Pens"],
      });
    });
  });

  describe("compareStores", () => {
    it("keeps every store, including duplicate names, by registration index", () => {
      list.addOffice(makeOffice("Office A", { Pens: 2 }));
      list.addStore(makeStore("Depot", { Pens: 1 }));
      list.addStore(makeStore("Depot", { Pens: 4 }));
      list.addStore(makeStore("Empty", {}));

      expect(list.compareStores()).toEqual([
        { index: 0, name: "Depot", total: 2, unavailableItems: [] },
        { index: 1, name: "Depot", total: 8, unavailableItems: [] },
        {
          index: 2,
          name: "Empty",
          total: Number.POSITIVE_INFINITY,
          unavailableItems: ["Pens"],
        },
      ]);
    });
  });
});
