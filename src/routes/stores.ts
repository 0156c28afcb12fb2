import express, { Request, Response } from "express";
import type { SmartShoppingList } from "../core/smartShoppingList";
import { getAllStores, registerStore, serializeStore } from "../services/stores";
import { errorMessage } from "../utils/errorMessage";
import { requestValidator } from "../utils/requestValidator";
import { type StoreRequest, ZStoreSchema } from "../validations/store";

export default function storeRouter(list: SmartShoppingList) {
  const router = express.Router();

  router.post(
    "/",
    requestValidator(ZStoreSchema),
    (req: Request, res: Response) => {
      try {
        const request: StoreRequest = req.body;
        const store = registerStore(list, request);
        res.status(201).json(serializeStore(store));
      } catch (err) {
        console.error("Failed to register store:", err);
        res
          .status(500)
          .json({ error: "Failed to register store", details: errorMessage(err) });
      }
    }
  );

  router.get("/", (_req: Request, res: Response) => {
    res.status(200).json(getAllStores(list));
  });

  return router;
}
