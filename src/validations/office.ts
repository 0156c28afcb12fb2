import { z } from "zod";

export const ZItemName = z.string().trim().min(1, "Item name cannot be empty");

export const ZSupplyRequest = z.object({
  item: ZItemName,
  quantity: z.number().int().positive(),
});

export const ZOfficeSchema = z.object({
  name: z.string().trim().min(1, "Office name cannot be empty"),
  supplies: ZSupplyRequest.array(),
});

export type OfficeRequest = z.infer<typeof ZOfficeSchema>;
export type SupplyRequest = z.infer<typeof ZSupplyRequest>;
