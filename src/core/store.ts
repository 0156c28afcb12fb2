import type { PriceLookup } from "../types/shopping";
import { UNAVAILABLE_PRICE } from "../types/constants";

export class Store {
  private readonly prices = new Map<string, number>();

  constructor(public readonly name: string) {}

  setPrice(item: string, price: number) {
    this.prices.set(item, price);
  }

  /** Unit price of `item`, or `Infinity` when the store does not sell it. */
  getPrice(item: string): number {
    const lookup = this.lookupPrice(item);
    return lookup.available ? lookup.price : UNAVAILABLE_PRICE;
  }

  lookupPrice(item: string): PriceLookup {
    const price = this.prices.get(item);
    if (price === undefined || price === UNAVAILABLE_PRICE) {
      return { available: false };
    }
    return { available: true, price };
  }

  getPrices(): Map<string, number> {
    return new Map(this.prices);
  }
}
