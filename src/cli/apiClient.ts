import axios, { AxiosInstance } from "axios";
import { API_TIMEOUT_MS, USER_AGENT } from "../types/constants";
import type { ShoppingReport } from "../types/report";
import { errorMessage } from "../utils/errorMessage";
import type { OfficeRequest } from "../validations/office";
import type { StoreRequest } from "../validations/store";

export interface SampleDataLoaded {
  message: string;
  offices: number;
  stores: number;
}

export class ShoppingApiClient {
  private readonly http: AxiosInstance;

  constructor(baseURL: string) {
    this.http = axios.create({
      baseURL,
      timeout: API_TIMEOUT_MS,
      headers: {
        "User-Agent": USER_AGENT,
      },
    });
  }

  async addOffice(request: OfficeRequest) {
    await this.http.post("/offices", request);
  }

  async addStore(request: StoreRequest) {
    await this.http.post("/stores", request);
  }

  async loadSampleData() {
    const { data } = await this.http.post<SampleDataLoaded>("/sample-data");
    return data;
  }

  async getReport() {
    const { data } = await this.http.get<ShoppingReport>("/report");
    return data;
  }
}

export function describeApiError(error: unknown) {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `API answered ${error.response.status}: ${JSON.stringify(error.response.data)}`;
    }
    if (error.code === "ECONNREFUSED" || error.code === "ETIMEDOUT") {
      return "Shopping API is unreachable";
    }
  }
  return errorMessage(error);
}
