import { Office } from "../../src/core/office";
import { Store } from "../../src/core/store";

export function makeOffice(name: string, supplies: Record<string, number>) {
  const office = new Office(name);
  for (const [item, quantity] of Object.entries(supplies)) {
    office.addItem(item, quantity);
  }
  return office;
}

export function makeStore(name: string, prices: Record<string, number>) {
  const store = new Store(name);
  for (const [item, price] of Object.entries(prices)) {
    store.setPrice(item, price);
  }
  return store;
}
