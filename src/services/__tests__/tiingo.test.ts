import { describe, it, expect } from "vitest";
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { TiingoService } from "../tiingo.js";
import { FetchError } from "../../errors.js";

type Reply = { status: number; data?: unknown } | "network";

/** Axios instance served by an in-process adapter. */
function stubHttp(reply: Reply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      if (reply === "network") {
        throw new AxiosError("socket hang up", "ECONNRESET", config);
      }
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: reply.status === 200 ? "OK" : "Error",
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          "ERR_BAD_RESPONSE",
          config,
          null,
          response
        );
      }
      return response;
    },
  });
  return { http, requests };
}

function service(reply: Reply) {
  const { http, requests } = stubHttp(reply);
  return {
    tiingo: new TiingoService({
      apiKey: "test-key",
      baseUrl: "https://api.tiingo.test/tiingo/daily/",
      timeoutMs: 5_000,
      http,
    }),
    requests,
  };
}

async function fetchError(reply: Reply): Promise<FetchError> {
  const { tiingo } = service(reply);
  const error = await tiingo.fetchDaily("AAPL").catch((e: unknown) => e);
  if (!(error instanceof FetchError)) {
    throw new Error(`expected a FetchError, got ${String(error)}`);
  }
  return error;
}

describe("TiingoService", () => {
  it("requests the daily prices endpoint with token and window", async () => {
    const { tiingo, requests } = service({ status: 200, data: [] });

    await tiingo.fetchDaily("BRK-B", "2020-01-01", "2020-12-31");

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://api.tiingo.test/tiingo/daily/brk-b/prices");
    expect(requests[0]?.params).toEqual({
      token: "test-key",
      startDate: "2020-01-01",
      endDate: "2020-12-31",
    });
    expect(requests[0]?.timeout).toBe(5_000);
  });

  it("omits the window when none is given", async () => {
    const { tiingo, requests } = service({ status: 200, data: [] });
    await tiingo.fetchDaily("MSFT");
    expect(requests[0]?.params).toEqual({ token: "test-key" });
  });

  it("maps bars to price points", async () => {
    const { tiingo } = service({
      status: 200,
      data: [
        {
          date: "2024-01-02T00:00:00.000Z",
          open: 187.15,
          high: 188.44,
          low: 183.89,
          close: 185.64,
          adjClose: 184.94,
          volume: 82488700,
          divCash: 0,
        },
      ],
    });

    await expect(tiingo.fetchDaily("aapl")).resolves.toEqual([
      {
        ticker: "AAPL",
        date: "2024-01-02",
        open: 187.15,
        high: 188.44,
        low: 183.89,
        close: 185.64,
        adjClose: 184.94,
        volume: 82488700,
      },
    ]);
  });

  it("reports credentials only when a key is set", () => {
    expect(service({ status: 200, data: [] }).tiingo.hasCredentials()).toBe(true);
    expect(
      new TiingoService({ apiKey: "", baseUrl: "https://api.tiingo.test" }).hasCredentials()
    ).toBe(false);
  });

  it("treats a malformed payload as permanent", async () => {
    const error = await fetchError({ status: 200, data: { detail: "Error: Ticker 'AAPL' not found" } });
    expect(error.kind).toBe("permanent");
    expect(error.reason).toBe("invalid-payload");
  });

  it("treats a bar with missing prices as permanent", async () => {
    const error = await fetchError({ status: 200, data: [{ date: "2024-01-02T00:00:00.000Z", close: 1 }] });
    expect(error.reason).toBe("invalid-payload");
    expect(error.retryable).toBe(false);
  });

  it.each([
    [429, "rate-limited"],
    [500, "server-error"],
    [503, "server-error"],
  ] as const)("classifies HTTP %i as transient %s", async (status, reason) => {
    const error = await fetchError({ status });
    expect(error.kind).toBe("transient");
    expect(error.reason).toBe(reason);
    expect(error.retryable).toBe(true);
  });

  it.each([
    [400, "bad-request"],
    [401, "auth"],
    [403, "auth"],
    [404, "not-found"],
  ] as const)("classifies HTTP %i as permanent %s", async (status, reason) => {
    const error = await fetchError({ status });
    expect(error.kind).toBe("permanent");
    expect(error.reason).toBe(reason);
  });

  it("names the ticker when it is not found", async () => {
    const error = await fetchError({ status: 404 });
    expect(error.message).toBe("Ticker AAPL not found");
    expect(error.symbol).toBe("AAPL");
  });

  it("classifies a connection failure as transient", async () => {
    const error = await fetchError("network");
    expect(error.kind).toBe("transient");
    expect(error.reason).toBe("network");
    expect(error.message).toBe("Network error for AAPL: socket hang up");
  });
});
