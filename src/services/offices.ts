import { Office } from "../core/office";
import type { SmartShoppingList } from "../core/smartShoppingList";
import type { OfficeRequest } from "../validations/office";
import { toSupplyEntries } from "./report";

export function registerOffice(list: SmartShoppingList, request: OfficeRequest) {
  const office = new Office(request.name);

  for (const { item, quantity } of request.supplies) {
    office.addItem(item, quantity);
  }

  list.addOffice(office);
  console.log(
    `Office '${office.name}' registered with ${request.supplies.length} supply lines`
  );

  return office;
}

export function serializeOffice(office: Office) {
  return {
    name: office.name,
    supplies: toSupplyEntries(office.getSupplies()),
  };
}

export function getAllOffices(list: SmartShoppingList) {
  return { isSuccess: true, data: list.getOffices().map(serializeOffice) };
}
