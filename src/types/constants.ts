export const UNAVAILABLE_PRICE = Number.POSITIVE_INFINITY;

export const DEFAULT_PORT = 3000;
export const API_TIMEOUT_MS = 10000;
export const USER_AGENT = "OfficeSupplyConsolidator/1.0";

export const SAMPLE_DATA_FILE = "sample-data.json";
