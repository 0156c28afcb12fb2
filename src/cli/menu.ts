import type { OfficeRequest, SupplyRequest } from "../validations/office";
import type { PriceRequest, StoreRequest } from "../validations/store";
import { describeApiError } from "./apiClient";
import { formatMoney, formatReport } from "./format";
import { parsePrice, parseQuantity, printHeader, type Prompter } from "./prompts";
import type { ShoppingReport } from "../types/report";

// The subset of ShoppingApiClient the menu drives
export interface ShoppingApi {
  addOffice(request: OfficeRequest): Promise<void>;
  addStore(request: StoreRequest): Promise<void>;
  loadSampleData(): Promise<unknown>;
  getReport(): Promise<ShoppingReport>;
}

export async function collectOffice(prompter: Prompter): Promise<OfficeRequest | null> {
  printHeader(prompter, "ADD OFFICE");

  const name = (await prompter.ask("Enter office name: ")).trim();
  if (!name) {
    prompter.print("Office name cannot be empty.");
    return null;
  }

  prompter.print("");
  prompter.print(`Adding supplies for ${name}`);
  prompter.print("Enter items (type 'done' when finished):");

  const supplies: SupplyRequest[] = [];
  for (;;) {
    const item = (await prompter.ask("  Item name (or 'done'): ")).trim();
    if (item.toLowerCase() === "done") break;

    if (!item) {
      prompter.print("  Item name cannot be empty.");
      continue;
    }

    const quantity = parseQuantity(await prompter.ask(`  Quantity for ${item}: `));
    if (!quantity.ok) {
      prompter.print(`  ${quantity.message}`);
      continue;
    }

    supplies.push({ item, quantity: quantity.value });
    prompter.print(`  ✓ Added ${quantity.value} ${item}`);
  }

  return { name, supplies };
}

export async function collectStore(prompter: Prompter): Promise<StoreRequest | null> {
  printHeader(prompter, "ADD STORE");

  const name = (await prompter.ask("Enter store name: ")).trim();
  if (!name) {
    prompter.print("Store name cannot be empty.");
    return null;
  }

  prompter.print("");
  prompter.print(`Adding prices for ${name}`);
  prompter.print("Enter item prices (type 'done' when finished):");

  const prices: PriceRequest[] = [];
  for (;;) {
    const item = (await prompter.ask("  Item name (or 'done'): ")).trim();
    if (item.toLowerCase() === "done") break;

    if (!item) {
      prompter.print("  Item name cannot be empty.");
      continue;
    }

    const price = parsePrice(await prompter.ask(`  Price for ${item}: $`));
    if (!price.ok) {
      prompter.print(`  ${price.message}`);
      continue;
    }

    prices.push({ item, price: price.value });
    prompter.print(`  ✓ Set ${item} price to ${formatMoney(price.value)}`);
  }

  return { name, prices };
}

const MENU_LINES = [
  "",
  "-".repeat(60),
  "MENU:",
  "  1. Add an office with supplies",
  "  2. Add a store with prices",
  "  3. View results (merged list & cheapest store)",
  "  4. Load sample data (demo)",
  "  5. Exit",
  "-".repeat(60),
];

async function handleChoice(choice: string, prompter: Prompter, api: ShoppingApi) {
  switch (choice) {
    case "1": {
      const office = await collectOffice(prompter);
      if (office) {
        await api.addOffice(office);
        prompter.print("");
        prompter.print(`✓ Office '${office.name}' added successfully!`);
      }
      return;
    }
    case "2": {
      const store = await collectStore(prompter);
      if (store) {
        await api.addStore(store);
        prompter.print("");
        prompter.print(`✓ Store '${store.name}' added successfully!`);
      }
      return;
    }
    case "3":
      for (const line of formatReport(await api.getReport())) {
        prompter.print(line);
      }
      return;
    case "4":
      await api.loadSampleData();
      prompter.print("");
      prompter.print("✓ Sample data loaded successfully!");
      return;
    default:
      prompter.print("");
      prompter.print("⚠ Invalid choice. Please enter 1-5.");
  }
}

/** Runs the interactive menu until the user picks "Exit". */
export async function runMenu(prompter: Prompter, api: ShoppingApi) {
  printHeader(prompter, "SMART SHOPPING LIST - Multi-Office Management System");

  for (;;) {
    for (const line of MENU_LINES) {
      prompter.print(line);
    }

    const choice = (await prompter.ask("\nEnter your choice (1-5): ")).trim();
    if (choice === "5") {
      prompter.print("");
      prompter.print("Thank you for using Smart Shopping List!");
      return;
    }

    try {
      await handleChoice(choice, prompter, api);
    } catch (error) {
      prompter.print("");
      prompter.print(`⚠ Request failed: ${describeApiError(error)}`);
    }
  }
}
