import { Store } from "../core/store";
import type { SmartShoppingList } from "../core/smartShoppingList";
import type { StoreRequest } from "../validations/store";

export function registerStore(list: SmartShoppingList, request: StoreRequest) {
  const store = new Store(request.name);

  for (const { item, price } of request.prices) {
    store.setPrice(item, price);
  }

  list.addStore(store);
  console.log(
    `Store '${store.name}' registered with ${request.prices.length} prices`
  );

  return store;
}

export function serializeStore(store: Store) {
  return {
    name: store.name,
    prices: Array.from(store.getPrices(), ([item, price]) => ({ item, price })),
  };
}

export function getAllStores(list: SmartShoppingList) {
  return { isSuccess: true, data: list.getStores().map(serializeStore) };
}
