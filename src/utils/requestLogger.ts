import { Request, Response, NextFunction } from "express";

export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const { method, originalUrl, body } = req;
  const startedAt = Date.now();

  const logParts = [`[${new Date(startedAt).toISOString()}]`, method, originalUrl];

  if (
    ["POST", "PUT", "PATCH"].includes(method.toUpperCase()) &&
    body &&
    Object.keys(body).length
  ) {
    logParts.push(`Body: ${JSON.stringify(body)}`);
  }

  res.on("finish", () => {
    logParts.push(`${res.statusCode}`, `${Date.now() - startedAt}ms`);
    console.log(logParts.join(" | "));
  });

  next();
};
