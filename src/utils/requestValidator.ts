import { NextFunction, Request, Response } from "express";
import { ZodSchema } from "zod";

// Replaces the body with the parsed value so handlers see trimmed names
export const requestValidator =
  (schema: ZodSchema) => (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      console.warn(`Rejected ${req.method} ${req.originalUrl}: invalid body`);
      res.status(400).json({ error: result.error.flatten() });
      return;
    }
    req.body = result.data;
    next();
  };
