import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { CollaboratorError, CollaboratorErrorCode } from "../services/collaborators/errors.js";
import { WeatherApiClient } from "../services/collaborators/weather.client.js";

const body = (forecastday: unknown[]) => ({
  current: { condition: { text: "Patchy rain nearby" } },
  forecast: { forecastday },
});

const day = { day: { maxtemp_f: 61.3, mintemp_f: 50.1, daily_chance_of_rain: "83" } };

describe("WeatherApiClient", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const client = new WeatherApiClient({ apiKey: "test-key", timeoutMs: 1_000, baseUrl: "https://weather.test/v1" });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reads current conditions and today's forecast", async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify(body([day, day]))));

    expect(await client.lookup("94102")).toEqual({
      conditionText: "Patchy rain nearby",
      highF: 61.3,
      lowF: 50.1,
      rainChancePct: 83,
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://weather.test/v1/forecast.json?key=test-key&q=94102&days=2&aqi=no&alerts=no");
  });

  it("refuses to run without an API key", async () => {
    const unkeyed = new WeatherApiClient({ apiKey: undefined, timeoutMs: 1_000 });

    await expect(unkeyed.lookup("94102")).rejects.toMatchObject({ code: CollaboratorErrorCode.NOT_CONFIGURED });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports an empty forecast", async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify(body([]))));

    await expect(client.lookup("94102")).rejects.toThrow("No forecast data available");
  });

  it("reports an HTTP error status", async () => {
    fetchMock.mockResolvedValueOnce(new Response("nope", { status: 500, statusText: "Internal Server Error" }));

    const err = await client.lookup("94102").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CollaboratorError);
    expect(err).toMatchObject({
      code: CollaboratorErrorCode.HTTP_ERROR,
      collaborator: "weather",
      message: "Weather request failed: 500 Internal Server Error",
    });
  });

  it("reports a body that is not JSON as malformed", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

    await expect(client.lookup("94102")).rejects.toMatchObject({ code: CollaboratorErrorCode.MALFORMED_RESPONSE });
  });

  it("reports a network failure as unreachable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(client.lookup("94102")).rejects.toMatchObject({
      code: CollaboratorErrorCode.UNREACHABLE,
      message: "Weather API unreachable: fetch failed",
    });
  });
});
