import express, { Request, Response } from "express";
import type { SmartShoppingList } from "../core/smartShoppingList";
import { getAllOffices, registerOffice, serializeOffice } from "../services/offices";
import { errorMessage } from "../utils/errorMessage";
import { requestValidator } from "../utils/requestValidator";
import { type OfficeRequest, ZOfficeSchema } from "../validations/office";

export default function officeRouter(list: SmartShoppingList) {
  const router = express.Router();

  router.post(
    "/",
    requestValidator(ZOfficeSchema),
    (req: Request, res: Response) => {
      try {
        const request: OfficeRequest = req.body;
        const office = registerOffice(list, request);
        res.status(201).json(serializeOffice(office));
      } catch (err) {
        console.error("Failed to register office:", err);
        res
          .status(500)
          .json({ error: "Failed to register office", details: errorMessage(err) });
      }
    }
  );

  router.get("/", (_req: Request, res: Response) => {
    res.status(200).json(getAllOffices(list));
  });

  return router;
}
