/**
 * Static capability table: every declared provider, in canonical report
 * order, with the credentials it needs.
 *
 * A provider is eligible when its primary credential is present. Secondary
 * credentials only narrow what an eligible provider can do.
 */

import type { CredentialName, Credentials, ProviderId } from "@route-intel/types";
import type { IntelligenceProvider } from "../providers/provider.js";
import { TrafficProvider } from "../providers/traffic.js";
import { WeatherProvider } from "../providers/weather.js";
import { MapsProvider } from "../providers/maps.js";
import { RealtimeProvider } from "../providers/realtime.js";
import { FleetProvider } from "../providers/fleet.js";
import { EmergencyProvider } from "../providers/emergency.js";
import { LocationProvider } from "../providers/location.js";
import type { UpstreamHttp } from "../upstream/client.js";

/** Shared collaborators handed to every provider factory */
export interface ProviderDependencies {
  http: UpstreamHttp;
  /** Upper bound on route points any operation samples */
  maxSamplePoints?: number;
  /** Injectable clock for testability */
  now?: () => Date;
}

export interface ProviderDeclaration {
  readonly id: ProviderId;
  readonly name: string;
  /** Absent for credential-free providers, which are always eligible */
  readonly primaryCredential?: CredentialName;
  readonly secondaryCredentials: readonly CredentialName[];
  create(credentials: Credentials, deps: ProviderDependencies): IntelligenceProvider;
}

/** A credential's secret, or undefined when it is missing or blank */
export function secretOf(credentials: Credentials, name: CredentialName): string | undefined {
  const value = credentials[name];
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

export const PROVIDER_CATALOG: readonly ProviderDeclaration[] = [
  {
    id: "traffic",
    name: "Traffic Intelligence",
    primaryCredential: "tomtom",
    secondaryCredentials: ["here"],
    create: (credentials, deps) =>
      new TrafficProvider({
        tomtomKey: secretOf(credentials, "tomtom") ?? "",
        hereKey: secretOf(credentials, "here"),
        ...deps,
      }),
  },
  {
    id: "weather",
    name: "Weather Intelligence",
    primaryCredential: "openweather",
    secondaryCredentials: ["visualcrossing", "tomorrowIo"],
    create: (credentials, deps) =>
      new WeatherProvider({
        openWeatherKey: secretOf(credentials, "openweather") ?? "",
        visualCrossingKey: secretOf(credentials, "visualcrossing"),
        tomorrowIoKey: secretOf(credentials, "tomorrowIo"),
        ...deps,
      }),
  },
  {
    id: "maps",
    name: "Maps",
    primaryCredential: "googleMaps",
    secondaryCredentials: [],
    create: (credentials, deps) =>
      new MapsProvider({ apiKey: secretOf(credentials, "googleMaps") ?? "", ...deps }),
  },
  {
    id: "realtime",
    name: "Real-time Intelligence",
    primaryCredential: "googleMaps",
    secondaryCredentials: ["tomtom"],
    create: (credentials, deps) =>
      new RealtimeProvider({
        googleMapsKey: secretOf(credentials, "googleMaps") ?? "",
        tomtomKey: secretOf(credentials, "tomtom"),
        ...deps,
      }),
  },
  {
    id: "fleet",
    name: "Fleet Intelligence",
    secondaryCredentials: [],
    create: () => new FleetProvider(),
  },
  {
    id: "emergency",
    name: "Emergency Response",
    primaryCredential: "googleMaps",
    secondaryCredentials: ["emergencyApi"],
    create: (credentials, deps) =>
      new EmergencyProvider({
        googleMapsKey: secretOf(credentials, "googleMaps") ?? "",
        emergencyApiKey: secretOf(credentials, "emergencyApi"),
        ...deps,
      }),
  },
  {
    id: "location",
    name: "Location Intelligence",
    primaryCredential: "googleMaps",
    secondaryCredentials: [],
    create: (credentials, deps) =>
      new LocationProvider({ googleMapsKey: secretOf(credentials, "googleMaps") ?? "", ...deps }),
  },
];
