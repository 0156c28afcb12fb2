import express, { ErrorRequestHandler } from "express";
import { SmartShoppingList } from "./core/smartShoppingList";
import officeRouter from "./routes/offices";
import resultsRouter from "./routes/results";
import sampleDataRouter from "./routes/sampleData";
import storeRouter from "./routes/stores";
import { errorMessage } from "./utils/errorMessage";
import { requestLogger } from "./utils/requestLogger";

// Body parser failures (malformed JSON) arrive here with a 4xx status
const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const status =
    typeof err?.status === "number" && err.status >= 400 && err.status < 500
      ? err.status
      : 500;
  if (status === 500) {
    console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  }
  res.status(status).json({ error: "Request failed", details: errorMessage(err) });
};

export interface AppOptions {
  list?: SmartShoppingList;
  sampleDataPath?: string;
}

// One shopping list per app instance; it lives as long as the process
export function createApp({ list = new SmartShoppingList(), sampleDataPath }: AppOptions = {}) {
  const app = express();
  app.use(express.json());
  app.use(requestLogger);

  app.use("/offices", officeRouter(list));
  app.use("/stores", storeRouter(list));
  app.use("/sample-data", sampleDataRouter(list, sampleDataPath));
  app.use("/", resultsRouter(list));
  app.use(errorHandler);

  return app;
}
