import fs from "fs/promises";
import path from "path";
import type { SmartShoppingList } from "../core/smartShoppingList";
import { SAMPLE_DATA_FILE } from "../types/constants";
import { ZSampleDataSchema } from "../validations/sampleData";
import { registerOffice } from "./offices";
import { registerStore } from "./stores";

export const DEFAULT_SAMPLE_DATA_PATH = path.join(
  __dirname,
  "../data",
  SAMPLE_DATA_FILE
);

export async function loadSampleData(
  list: SmartShoppingList,
  filePath: string = DEFAULT_SAMPLE_DATA_PATH
) {
  console.log(`Loading sample data from ${filePath}...`);

  const raw = await fs.readFile(filePath, "utf8");
  const parsed = ZSampleDataSchema.safeParse(JSON.parse(raw));

  if (!parsed.success) {
    throw new Error(
      `Invalid sample data in ${filePath}: ${JSON.stringify(parsed.error.flatten())}`
    );
  }

  const { data } = parsed;

  for (const office of data.offices) {
    registerOffice(list, office);
  }
  for (const store of data.stores) {
    registerStore(list, store);
  }

  console.log(
    `Sample data loaded: ${data.offices.length} offices, ${data.stores.length} stores`
  );

  return { offices: data.offices.length, stores: data.stores.length };
}
