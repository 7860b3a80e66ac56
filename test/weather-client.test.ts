import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ResponseCache } from "../src/cache.js";
import type { LocationConfig } from "../src/types.js";
import { fetchWeather } from "../src/weather-client.js";

const BOGOTA: LocationConfig = {
  name: "Medellín",
  latitude: 6.244,
  longitude: -75.581,
  timezone: "America/Bogota",
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

const BODY = {
  latitude: 6.25,
  longitude: -75.5,
  timezone: "America/Bogota",
  hourly_units: { time: "iso8601", temperature_2m: "°C", wind_speed_10m: "km/h" },
  hourly: {
    time: ["2024-01-01T00:00", "2024-01-01T01:00"],
    temperature_2m: [18.2, null],
    wind_speed_10m: [4, 5.5],
    snowfall: [0, 0],
  },
};

function mockFetch(response: () => Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
}

function calledUrl(fetchMock: ReturnType<typeof mockFetch>): URL {
  const [input] = fetchMock.mock.calls[0];
  return new URL(String(input));
}

describe("fetchWeather validation", () => {
  it.each([
    [91, 0],
    [-90.5, 0],
    [0, 181],
    [0, -180.01],
  ])("rejects lat=%s lon=%s without touching the network", async (latitude, longitude) => {
    const fetchMock = mockFetch(() => jsonResponse(BODY));

    const result = await fetchWeather(
      { ...BOGOTA, latitude, longitude },
      { variables: ["temperature"] },
      { fetch: fetchMock }
    );

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe("ValidationError");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects unknown variables before any request", async () => {
    const fetchMock = mockFetch(() => jsonResponse(BODY));

    const result = await fetchWeather(
      BOGOTA,
      { variables: ["temperature", "pressure"] },
      { fetch: fetchMock }
    );

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "UnsupportedVariableError", variable: "pressure" },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects an empty variable set and reversed dates", async () => {
    const fetchMock = mockFetch(() => jsonResponse(BODY));

    const empty = await fetchWeather(BOGOTA, { variables: [] }, { fetch: fetchMock });
    const reversed = await fetchWeather(
      BOGOTA,
      { variables: ["temperature"], startDate: "2024-01-02", endDate: "2024-01-01" },
      { fetch: fetchMock }
    );
    const impossible = await fetchWeather(
      BOGOTA,
      { variables: ["temperature"], startDate: "2024-02-30" },
      { fetch: fetchMock }
    );

    expect(!empty.ok && empty.error.message).toBe(
      "At least one weather variable must be requested"
    );
    expect(!reversed.ok && reversed.error.message).toBe(
      "start_date 2024-01-02 is after end_date 2024-01-01"
    );
    expect(!impossible.ok && impossible.error.message).toBe(
      'Invalid date "2024-02-30", expected YYYY-MM-DD'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("fetchWeather request", () => {
  it("sends coordinates, provider codes, dates and timezone", async () => {
    const fetchMock = mockFetch(() => jsonResponse(BODY));

    await fetchWeather(
      BOGOTA,
      {
        variables: ["wind_speed", "temperature", "wind_speed"],
        startDate: "2024-01-01",
        endDate: "2024-01-03",
      },
      { fetch: fetchMock }
    );

    const url = calledUrl(fetchMock);
    expect(url.origin + url.pathname).toBe("https://api.open-meteo.com/v1/forecast");
    expect(url.searchParams.get("latitude")).toBe("6.244");
    expect(url.searchParams.get("longitude")).toBe("-75.581");
    expect(url.searchParams.get("hourly")).toBe("temperature_2m,wind_speed_10m");
    expect(url.searchParams.get("start_date")).toBe("2024-01-01");
    expect(url.searchParams.get("end_date")).toBe("2024-01-03");
    expect(url.searchParams.get("timezone")).toBe("America/Bogota");
  });

  it("defaults both dates to today in the location's timezone", async () => {
    const fetchMock = mockFetch(() => jsonResponse(BODY));

    await fetchWeather(
      BOGOTA,
      { variables: ["temperature"] },
      { fetch: fetchMock, now: new Date("2024-01-01T03:00:00Z") }
    );

    const url = calledUrl(fetchMock);
    expect(url.searchParams.get("start_date")).toBe("2023-12-31");
    expect(url.searchParams.get("end_date")).toBe("2023-12-31");
  });
});

describe("fetchWeather responses", () => {
  it("returns the known series with units and drops unknown keys", async () => {
    const result = await fetchWeather(
      BOGOTA,
      { variables: ["temperature", "wind_speed"], startDate: "2024-01-01" },
      { fetch: mockFetch(() => jsonResponse(BODY)) }
    );

    expect(result).toEqual({
      ok: true,
      value: {
        latitude: 6.25,
        longitude: -75.5,
        timezone: "America/Bogota",
        units: { temperature: "°C", wind_speed: "km/h" },
        requested: ["temperature", "wind_speed"],
        time: ["2024-01-01T00:00", "2024-01-01T01:00"],
        series: { temperature: [18.2, null], wind_speed: [4, 5.5] },
      },
    });
  });

  it("keeps the status code and provider reason of a non-2xx response", async () => {
    const result = await fetchWeather(
      BOGOTA,
      { variables: ["temperature"] },
      {
        fetch: mockFetch(() =>
          jsonResponse({ error: true, reason: "Parameter 'start_date' is out of range" }, 400)
        ),
      }
    );

    expect(result).toMatchObject({
      ok: false,
      error: {
        kind: "HttpStatusError",
        code: 400,
        message: "Weather API responded 400: Parameter 'start_date' is out of range",
      },
    });
  });

  it("classifies connection failures as network errors", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed");
    });

    const result = await fetchWeather(BOGOTA, { variables: ["temperature"] }, { fetch: fetchMock });

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "NetworkError", message: "Request failed: fetch failed" },
    });
  });

  it("aborts a request that outlives the timeout", async () => {
    const hanging = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );

    const result = await fetchWeather(
      BOGOTA,
      { variables: ["temperature"] },
      { fetch: hanging, timeoutMs: 20 }
    );

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "NetworkError", message: "Request timed out after 20ms" },
    });
  });

  it("rejects a body without an hourly axis", async () => {
    const result = await fetchWeather(
      BOGOTA,
      { variables: ["temperature"] },
      { fetch: mockFetch(() => jsonResponse({ latitude: 6.25 })) }
    );

    expect(!result.ok && result.error.kind).toBe("MalformedResponseError");
  });

  it("rejects a series shorter than the time axis", async () => {
    const body = {
      hourly: {
        time: ["2024-01-01T00:00", "2024-01-01T01:00", "2024-01-01T02:00"],
        temperature_2m: [10, 11],
      },
    };

    const result = await fetchWeather(
      BOGOTA,
      { variables: ["temperature"] },
      { fetch: mockFetch(() => jsonResponse(body)) }
    );

    expect(result).toMatchObject({
      ok: false,
      error: {
        kind: "MalformedResponseError",
        message: "hourly.temperature_2m has 2 samples for 3 timestamps",
      },
    });
  });

  it("rejects a 2xx body that is not JSON", async () => {
    const result = await fetchWeather(
      BOGOTA,
      { variables: ["temperature"] },
      { fetch: mockFetch(() => new Response("<html>maintenance</html>", { status: 200 })) }
    );

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "MalformedResponseError", message: "Response body is not valid JSON" },
    });
  });
});

describe("fetchWeather with the global fetch", () => {
  beforeEach(() => {
    vi.stubGlobal("fetch", vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("uses the global fetch when none is injected", async () => {
    const globalFetch = vi.mocked(globalThis.fetch);
    globalFetch.mockResolvedValue(jsonResponse(BODY));

    const result = await fetchWeather(BOGOTA, { variables: ["temperature"] });

    expect(result.ok).toBe(true);
    expect(globalFetch).toHaveBeenCalledTimes(1);
  });
});

describe("fetchWeather with a response cache", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), "weather-client-cache-"));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it("serves a repeated request from the cache", async () => {
    const cache = new ResponseCache({ directory, ttlMinutes: 15 });
    const fetchMock = mockFetch(() => jsonResponse(BODY));
    const request = { variables: ["temperature"], startDate: "2024-01-01" };

    const first = await fetchWeather(BOGOTA, request, { fetch: fetchMock, cache });
    const second = await fetchWeather(BOGOTA, request, { fetch: fetchMock, cache });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
  });

  it("does not cache a malformed body", async () => {
    const cache = new ResponseCache({ directory, ttlMinutes: 15 });
    const fetchMock = mockFetch(() => jsonResponse({ hourly: {} }));
    const request = { variables: ["temperature"], startDate: "2024-01-01" };

    await fetchWeather(BOGOTA, request, { fetch: fetchMock, cache });
    await fetchWeather(BOGOTA, request, { fetch: fetchMock, cache });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect((await cache.stats()).entries).toBe(0);
  });
});
