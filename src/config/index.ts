import dotenv from "dotenv";
import { DEFAULT_PORT } from "../types/constants";

dotenv.config();

export function getPort() {
  const port = Number(process.env.PORT);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}

export function getApiUrl() {
  return process.env.SHOPPING_API_URL || `http://localhost:${getPort()}`;
}
