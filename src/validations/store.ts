import { z } from "zod";
import { ZItemName } from "./office";

export const ZPriceRequest = z.object({
  item: ZItemName,
  price: z.number().finite().nonnegative(),
});

export const ZStoreSchema = z.object({
  name: z.string().trim().min(1, "Store name cannot be empty"),
  prices: ZPriceRequest.array(),
});

export type StoreRequest = z.infer<typeof ZStoreSchema>;
export type PriceRequest = z.infer<typeof ZPriceRequest>;
