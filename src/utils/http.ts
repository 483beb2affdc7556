// CHANGE: Provide single-attempt HTTP JSON helper with a bounded timeout.
// WHY: A slow statistics service must never stall an installation; a timeout counts as a failed fetch.

import axios, { AxiosInstance } from "axios";
import { debug } from "../logger.js";

const httpClient: AxiosInstance = axios.create({
  maxRedirects: 5,
  headers: {
    "User-Agent": "shy-resolver/1.0",
    Accept: "application/json"
  }
});

/**
 * Perform one GET request expecting JSON payload. No retries.
 *
 * @param url - Target URL.
 * @param timeoutMs - Upper bound for the whole request.
 * @returns Response data and status.
 * @throws AxiosError on timeout, transport failure or non-2xx status.
 */
export async function getJson<T>(
  url: string,
  timeoutMs: number
): Promise<{ readonly data: T; readonly status: number }> {
  debug(`HTTP GET ${url} (timeout ${timeoutMs}ms)`);
  const response = await httpClient.get<T>(url, { timeout: timeoutMs });
  debug(`HTTP ${response.status} ${url}`);
  return {
    data: response.data,
    status: response.status
  };
}

export { httpClient };
