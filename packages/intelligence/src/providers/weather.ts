/**
 * Weather intelligence provider.
 *
 * - Current conditions: OpenWeather current weather per sampled point
 * - Summer risks: Visual Crossing daily maxima (needs its own key)
 * - Monsoon risks: Tomorrow.io daily rain totals (needs its own key), with
 *   point elevations from the Open-Meteo elevation API
 */

import { z } from "zod";
import type {
  Coordinate,
  CurrentConditionsPayload,
  MonsoonRisksPayload,
  RiskArea,
  RiskLevel,
  SummerRisksPayload,
  TemperatureHotspot,
  WeatherObservation,
} from "@route-intel/types";
import { formatLatLng, sampleRoutePoints } from "../geo/index.js";
import type { UpstreamHttp } from "../upstream/client.js";
import { fetchElevations } from "./elevation.js";
import {
  DEFAULT_MAX_SAMPLE_POINTS,
  attempt,
  requireSecret,
  round1,
  type IntelligenceProvider,
  type OperationContext,
  type ProviderOperation,
  type SamplingOptions,
} from "./provider.js";

// ---------------------------------------------------------------------------
// Upstream schemas
// ---------------------------------------------------------------------------

const openWeatherSchema = z.object({
  main: z.object({ temp: z.number(), humidity: z.number().optional() }),
  weather: z.array(z.object({ description: z.string() })).default([]),
  wind: z.object({ speed: z.number() }).optional(),
  visibility: z.number().optional(),
});

const visualCrossingSchema = z.object({
  days: z.array(z.object({ tempmax: z.number().optional() })).default([]),
});

const tomorrowForecastSchema = z.object({
  timelines: z.object({
    daily: z
      .array(z.object({ values: z.object({ rainAccumulationSum: z.number().optional() }) }))
      .default([]),
  }),
});

// ---------------------------------------------------------------------------
// Thresholds
// ---------------------------------------------------------------------------

const CONDITIONS_SAMPLE_LIMIT = 5;
const RISK_SAMPLE_LIMIT = 8;

/** Daily maximum above which a point is an extreme heat hotspot (°C) */
export const EXTREME_HEAT_C = 42;

const EXTREME_HEAT_RECOMMENDATIONS = [
  "Check vehicle cooling system before travel",
  "Carry extra water and electrolytes",
  "Avoid travel during peak afternoon hours (12 PM - 4 PM)",
  "Monitor engine temperature closely",
  "Take frequent breaks in shaded areas",
];

export function floodRisk(precipitationMm: number, elevationMeters: number): RiskLevel {
  if (precipitationMm > 150 && elevationMeters < 100) return "extreme";
  if (precipitationMm > 100 && elevationMeters < 200) return "high";
  if (precipitationMm > 50) return "moderate";
  return "low";
}

export function landslideRisk(precipitationMm: number, elevationMeters: number): RiskLevel {
  if (elevationMeters > 1000 && precipitationMm > 100) return "extreme";
  if (elevationMeters > 500 && precipitationMm > 75) return "high";
  if (elevationMeters > 300 && precipitationMm > 50) return "moderate";
  return "low";
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface WeatherProviderOptions extends SamplingOptions {
  /** OpenWeather API key */
  openWeatherKey: string;
  /** Visual Crossing API key; summer risks fail without it */
  visualCrossingKey?: string;
  /** Tomorrow.io API key; monsoon risks fail without it */
  tomorrowIoKey?: string;
  http: UpstreamHttp;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class WeatherProvider implements IntelligenceProvider {
  readonly id = "weather" as const;
  readonly name = "Weather Intelligence";
  readonly operations: readonly ProviderOperation[];

  private readonly openWeatherKey: string;
  private readonly visualCrossingKey: string | undefined;
  private readonly tomorrowIoKey: string | undefined;
  private readonly http: UpstreamHttp;
  private readonly maxSamplePoints: number;

  constructor(options: WeatherProviderOptions) {
    if (options.openWeatherKey.trim() === "") {
      throw new Error("OpenWeather API key is required");
    }
    this.openWeatherKey = options.openWeatherKey;
    this.visualCrossingKey = options.visualCrossingKey;
    this.tomorrowIoKey = options.tomorrowIoKey;
    this.http = options.http;
    this.maxSamplePoints = options.maxSamplePoints ?? DEFAULT_MAX_SAMPLE_POINTS;

    this.operations = [
      {
        kind: "current-conditions",
        run: (ctx) => attempt(() => this.fetchCurrentConditions(ctx)),
      },
      {
        kind: "summer-risks",
        run: (ctx) => attempt(() => this.analyzeSummerRisks(ctx)),
      },
      {
        kind: "monsoon-risks",
        run: (ctx) => attempt(() => this.analyzeMonsoonRisks(ctx)),
      },
    ];
  }

  private sample(ctx: OperationContext, limit: number): Coordinate[] {
    return sampleRoutePoints(ctx.route.points, Math.min(limit, this.maxSamplePoints));
  }

  async fetchCurrentConditions(ctx: OperationContext): Promise<CurrentConditionsPayload> {
    const observations = await Promise.all(
      this.sample(ctx, CONDITIONS_SAMPLE_LIMIT).map(async (point): Promise<WeatherObservation> => {
        const res = await this.http.get(
          "openweather",
          {
            url: "https://api.openweathermap.org/data/2.5/weather",
            params: { lat: point.lat, lon: point.lng, units: "metric", appid: this.openWeatherKey },
            signal: ctx.signal,
          },
          openWeatherSchema
        );
        return {
          coordinate: { lat: point.lat, lng: point.lng },
          temperatureC: round1(res.main.temp),
          condition: res.weather[0]?.description,
          humidity: res.main.humidity,
          windSpeedKmh: res.wind ? round1(res.wind.speed * 3.6) : undefined,
          visibilityKm: res.visibility !== undefined ? round1(res.visibility / 1000) : undefined,
        };
      })
    );
    return { kind: "current-conditions", observations };
  }

  async analyzeSummerRisks(ctx: OperationContext): Promise<SummerRisksPayload> {
    const key = requireSecret(this.visualCrossingKey, "Visual Crossing API key not provided");

    const points = this.sample(ctx, RISK_SAMPLE_LIMIT);
    const timelines = await Promise.all(
      points.map((point) =>
        this.http.get(
          "visualcrossing",
          {
            url:
              "https://weather.visualcrossing.com/VisualCrossingWebServices/rest/services/timeline/" +
              formatLatLng(point),
            params: { unitGroup: "metric", include: "days", key },
            signal: ctx.signal,
          },
          visualCrossingSchema
        )
      )
    );

    const temperatureHotspots: TemperatureHotspot[] = [];
    for (let i = 0; i < points.length; i++) {
      const point = points[i]!;
      const res = timelines[i]!;
      const maxima = res.days.flatMap((d) => (d.tempmax !== undefined ? [d.tempmax] : []));
      if (maxima.length === 0) continue;
      const maxTemperatureC = Math.max(...maxima);
      if (maxTemperatureC > EXTREME_HEAT_C) {
        temperatureHotspots.push({
          coordinate: { lat: point.lat, lng: point.lng },
          maxTemperatureC,
          riskLevel: "extreme",
          recommendations: EXTREME_HEAT_RECOMMENDATIONS,
        });
      }
    }

    const recommendations = [
      "Start travel early morning (5-7 AM) to avoid peak heat",
      "Check tire pressure and condition before travel",
      "Carry extra coolant and engine oil",
      "Plan stops every 2 hours in shaded areas",
    ];
    if (temperatureHotspots.length > 2) {
      recommendations.push(
        "EXTREME HEAT ALERT: Multiple hotspots detected on route",
        "Consider night travel during extreme heat wave periods",
        "Carry emergency water supplies (minimum 10 liters)"
      );
    }
    return { kind: "summer-risks", temperatureHotspots, recommendations };
  }

  async analyzeMonsoonRisks(ctx: OperationContext): Promise<MonsoonRisksPayload> {
    const key = requireSecret(this.tomorrowIoKey, "Tomorrow.io API key not provided");
    const points = this.sample(ctx, RISK_SAMPLE_LIMIT);

    const elevation = await fetchElevations(this.http, points, ctx.signal);

    const forecasts = await Promise.all(
      points.map((point) =>
        this.http.get(
          "tomorrow.io",
          {
            url: "https://api.tomorrow.io/v4/weather/forecast",
            params: { location: formatLatLng(point), timesteps: "1d", units: "metric", apikey: key },
            signal: ctx.signal,
          },
          tomorrowForecastSchema
        )
      )
    );

    const floodProneAreas: RiskArea[] = [];
    const landslideZones: RiskArea[] = [];
    for (let i = 0; i < points.length; i++) {
      const point = points[i]!;
      const res = forecasts[i]!;
      const precipitationMm = round1(
        res.timelines.daily.reduce((sum, d) => sum + (d.values.rainAccumulationSum ?? 0), 0)
      );
      const elevationMeters = elevation[i] ?? 0;
      const coordinate = { lat: point.lat, lng: point.lng };

      if (precipitationMm > 100) {
        floodProneAreas.push({
          coordinate,
          precipitationMm,
          elevationMeters,
          riskLevel: floodRisk(precipitationMm, elevationMeters),
        });
      }
      if (elevationMeters > 500 && precipitationMm > 50) {
        landslideZones.push({
          coordinate,
          precipitationMm,
          elevationMeters,
          riskLevel: landslideRisk(precipitationMm, elevationMeters),
        });
      }
    }

    const recommendations = [
      "Monitor rainfall forecasts and flood warnings",
      "Carry emergency supplies including food, water, and phone charger",
      "Avoid travel during heavy rainfall warnings",
      "Keep emergency contact numbers ready",
    ];
    if (floodProneAreas.length > 1) {
      recommendations.push(
        "FLOOD ALERT: Multiple flood-prone areas on route - consider alternate path"
      );
    }
    if (landslideZones.length > 0) {
      recommendations.push(
        "LANDSLIDE ALERT: Hilly areas with landslide risk - travel during daylight only"
      );
    }
    return { kind: "monsoon-risks", floodProneAreas, landslideZones, recommendations };
  }
}
