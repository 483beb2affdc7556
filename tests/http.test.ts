// CHANGE: Confirm HTTP helper makes exactly one bounded attempt.
// WHY: A failing statistics service must not be retried.

import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { getJson, httpClient } from "../src/utils/http.js";

const dummyConfig = {
  url: "https://stats.example/api/packages/x/recent",
  headers: {}
} as InternalAxiosRequestConfig;

describe("getJson", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("passes the timeout and returns data with status", async () => {
    const success = {
      status: 200,
      statusText: "OK",
      headers: { "Content-Type": "application/json" },
      config: dummyConfig,
      data: { value: "ok" }
    } satisfies AxiosResponse<{ readonly value: string }>;
    const spy = vi.spyOn(httpClient, "get").mockResolvedValueOnce(success);

    const response = await getJson<{ readonly value: string }>("https://stats.example/api/packages/x/recent", 2500);

    expect(response.data.value).toBe("ok");
    expect(response.status).toBe(200);
    expect(spy).toHaveBeenCalledWith("https://stats.example/api/packages/x/recent", { timeout: 2500 });
  });

  it("rejects non-2xx statuses before they reach callers", () => {
    expect(httpClient.defaults.validateStatus?.(200)).toBe(true);
    expect(httpClient.defaults.validateStatus?.(302)).toBe(false);
    expect(httpClient.defaults.validateStatus?.(503)).toBe(false);
  });

  it("does not retry on 5xx responses", async () => {
    const serverError = new AxiosError("server error");
    serverError.response = {
      status: 503,
      statusText: "Service Unavailable",
      headers: {},
      config: dummyConfig,
      data: null
    } satisfies AxiosResponse;
    const spy = vi.spyOn(httpClient, "get").mockRejectedValueOnce(serverError);

    await expect(getJson("https://stats.example/api/packages/x/recent", 1000)).rejects.toBe(serverError);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
