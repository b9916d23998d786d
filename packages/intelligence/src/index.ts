/**
 * @route-intel/intelligence
 *
 * Multi-provider route intelligence: enrich a route with traffic, weather,
 * real-time, fleet, emergency and location analysis, and compose the
 * results into one ordered report.
 *
 * Pipeline:
 * 1. Raw route input -> RouteContext (validated, frozen)
 * 2. Credentials -> eligible providers (ProviderRegistry)
 * 3. Providers run concurrently -> ProviderResults
 * 4. Payloads -> Sections (composer), merged in canonical order
 * 5. ReportResult -> rendered document
 */

// Errors
export * from "./errors.js";

// Route input and geometry
export * from "./route/context.js";
export * from "./geo/index.js";

// Upstream HTTP
export * from "./upstream/client.js";

// Providers
export * from "./providers/provider.js";
export { TrafficProvider, classifyCongestion } from "./providers/traffic.js";
export { WeatherProvider } from "./providers/weather.js";
export { MapsProvider } from "./providers/maps.js";
export { RealtimeProvider } from "./providers/realtime.js";
export { FleetProvider } from "./providers/fleet.js";
export { EmergencyProvider } from "./providers/emergency.js";
export { LocationProvider } from "./providers/location.js";

// Registry, composer, pipeline
export * from "./registry/catalog.js";
export * from "./registry/registry.js";
export { composeSections, CAPS, cleanText } from "./composer/index.js";
export * from "./pipeline/orchestrator.js";

// Rendering
export * from "./render/renderer.js";
export * from "./render/text-renderer.js";

// Configuration
export * from "./config/credentials.js";
export * from "./config/report-config.js";
