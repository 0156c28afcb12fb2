import express, { Request, Response } from "express";
import type { SmartShoppingList } from "../core/smartShoppingList";
import {
  buildShoppingReport,
  getComparisonByName,
  summarizeCheapest,
  toSortedSupplyEntries,
} from "../services/report";

export default function resultsRouter(list: SmartShoppingList) {
  const router = express.Router();

  router.get("/supplies/merged", (_req: Request, res: Response) => {
    res
      .status(200)
      .json({ isSuccess: true, data: toSortedSupplyEntries(list.mergeSupplies()) });
  });

  router.get("/comparison", (_req: Request, res: Response) => {
    res.status(200).json({ isSuccess: true, data: getComparisonByName(list) });
  });

  router.get("/cheapest", (_req: Request, res: Response) => {
    res.status(200).json(summarizeCheapest(list.findCheapestStore()));
  });

  router.get("/report", (_req: Request, res: Response) => {
    res.status(200).json(buildShoppingReport(list));
  });

  return router;
}
