import { z } from "zod";
import { ZOfficeSchema } from "./office";
import { ZStoreSchema } from "./store";

export const ZSampleDataSchema = z.object({
  offices: ZOfficeSchema.array(),
  stores: ZStoreSchema.array(),
});

export type SampleData = z.infer<typeof ZSampleDataSchema>;
