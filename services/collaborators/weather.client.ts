/**
 * WeatherAPI.com client — current conditions plus today's forecast day.
 * Docs: https://www.weatherapi.com/docs/
 */

import { z } from "zod";
import type { WeatherProvider, WeatherReading } from "../planner/types.js";
import { CollaboratorError, CollaboratorErrorCode, errorMessage } from "./errors.js";

const BASE_URL = "https://api.weatherapi.com/v1";
const FORECAST_DAYS = 2;

const ForecastResponseSchema = z.object({
  current: z.object({
    condition: z.object({ text: z.string() }),
  }),
  forecast: z.object({
    forecastday: z.array(
      z.object({
        day: z.object({
          maxtemp_f: z.number(),
          mintemp_f: z.number(),
          daily_chance_of_rain: z.coerce.number(),
        }),
      })
    ),
  }),
});

export interface WeatherApiClientOptions {
  apiKey: string | undefined;
  timeoutMs: number;
  baseUrl?: string;
}

export class WeatherApiClient implements WeatherProvider {
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(options: WeatherApiClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.baseUrl = options.baseUrl ?? BASE_URL;
  }

  async lookup(locationKey: string): Promise<WeatherReading> {
    if (!this.apiKey) {
      throw new CollaboratorError("weather", CollaboratorErrorCode.NOT_CONFIGURED, "WEATHER_API_KEY is not set");
    }

    const params = new URLSearchParams({
      key: this.apiKey,
      q: locationKey,
      days: String(FORECAST_DAYS),
      aqi: "no",
      alerts: "no",
    });

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/forecast.json?${params.toString()}`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new CollaboratorError("weather", CollaboratorErrorCode.UNREACHABLE, `Weather API unreachable: ${errorMessage(err)}`);
    }
    if (!response.ok) {
      throw new CollaboratorError(
        "weather",
        CollaboratorErrorCode.HTTP_ERROR,
        `Weather request failed: ${response.status} ${response.statusText}`
      );
    }

    // Non-JSON bodies fall through to the schema check as null.
    const body: unknown = await response.json().catch(() => null);
    const parsed = ForecastResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError("weather", CollaboratorErrorCode.MALFORMED_RESPONSE, "Weather response did not match the expected shape");
    }

    const today = parsed.data.forecast.forecastday[0];
    if (!today) {
      throw new CollaboratorError("weather", CollaboratorErrorCode.MALFORMED_RESPONSE, "No forecast data available");
    }

    return {
      conditionText: parsed.data.current.condition.text,
      highF: today.day.maxtemp_f,
      lowF: today.day.mintemp_f,
      rainChancePct: today.day.daily_chance_of_rain,
    };
  }
}
