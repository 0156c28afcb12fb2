import express, { Request, Response } from "express";
import type { SmartShoppingList } from "../core/smartShoppingList";
import { loadSampleData } from "../services/sampleData";
import { errorMessage } from "../utils/errorMessage";

export default function sampleDataRouter(
  list: SmartShoppingList,
  sampleDataPath?: string
) {
  const router = express.Router();

  router.post("/", async (_req: Request, res: Response) => {
    try {
      const loaded = await loadSampleData(list, sampleDataPath);
      res.status(201).json({ message: "Sample data loaded successfully", ...loaded });
    } catch (err) {
      console.error("Failed to load sample data:", err);
      res
        .status(500)
        .json({ error: "Failed to load sample data", details: errorMessage(err) });
    }
  });

  return router;
}
