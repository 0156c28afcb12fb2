import type { SupplyList } from "../types/shopping";

export class Office {
  private readonly supplies: SupplyList = new Map();

  constructor(public readonly name: string) {}

  /**
   * Adds `quantity` units of `item` to this office's demand. Quantities are
   * not validated here; callers filter input at the API/CLI boundary.
   */
  addItem(item: string, quantity = 1) {
    this.supplies.set(item, (this.supplies.get(item) ?? 0) + quantity);
  }

  getSupplies(): SupplyList {
    return new Map(this.supplies);
  }
}
