/**
 * Provider operation payloads.
 *
 * Every successful operation returns one member of the OperationPayload
 * union, discriminated by `kind`. All other fields are optional: upstream
 * services routinely return partial data, and the composer omits whatever
 * is missing.
 */

import type { Coordinate } from "./geo.js";
import type { VehicleClass } from "./route.js";

// ---------------------------------------------------------------------------
// Traffic
// ---------------------------------------------------------------------------

export type Season = "winter" | "spring" | "summer" | "monsoon";
export type CongestionLevel = "light" | "moderate" | "heavy" | "severe";

export interface SeasonalPattern {
  congestionLevel?: CongestionLevel;
  /** Percentage below free-flow speed (0-100) */
  averageCongestion?: number;
  peakHours?: string[];
}

export interface SeasonalCongestionPayload {
  kind: "seasonal-congestion";
  seasonalPatterns?: Partial<Record<Season, SeasonalPattern>>;
  peakCongestionMonths?: string[];
  recommendations?: string[];
}

export interface ConstructionZone {
  id?: string;
  description?: string;
  severity?: string;
  impact?: string;
  startTime?: string;
  endTime?: string;
  roadName?: string;
  coordinate?: Coordinate;
}

export interface ConstructionImpact {
  overallImpact?: "minimal" | "moderate" | "severe";
  totalZones?: number;
  delayEstimate?: string;
  alternateRouteRecommended?: boolean;
}

export interface ConstructionZonesPayload {
  kind: "construction-zones";
  activeConstruction?: ConstructionZone[];
  plannedConstruction?: ConstructionZone[];
  impactAssessment?: ConstructionImpact;
  recommendations?: string[];
}

// ---------------------------------------------------------------------------
// Weather
// ---------------------------------------------------------------------------

export interface WeatherObservation {
  coordinate: Coordinate;
  temperatureC?: number;
  condition?: string;
  humidity?: number;
  windSpeedKmh?: number;
  visibilityKm?: number;
}

export interface CurrentConditionsPayload {
  kind: "current-conditions";
  observations?: WeatherObservation[];
}

export type RiskLevel = "low" | "moderate" | "high" | "extreme";

export interface TemperatureHotspot {
  coordinate?: Coordinate;
  maxTemperatureC?: number;
  riskLevel?: RiskLevel;
  recommendations?: string[];
}

export interface SummerRisksPayload {
  kind: "summer-risks";
  temperatureHotspots?: TemperatureHotspot[];
  recommendations?: string[];
}

export interface RiskArea {
  coordinate?: Coordinate;
  precipitationMm?: number;
  elevationMeters?: number;
  riskLevel?: RiskLevel;
}

export interface MonsoonRisksPayload {
  kind: "monsoon-risks";
  floodProneAreas?: RiskArea[];
  landslideZones?: RiskArea[];
  recommendations?: string[];
}

// ---------------------------------------------------------------------------
// Maps
// ---------------------------------------------------------------------------

export type TerrainType = "urban" | "semi-urban" | "rural";

export interface TerrainSample {
  coordinate: Coordinate;
  terrain: TerrainType;
  locality?: string;
}

export interface TerrainClassificationPayload {
  kind: "terrain-classification";
  samples?: TerrainSample[];
  /** Share of samples per terrain type, in percent */
  distribution?: Partial<Record<TerrainType, number>>;
}

export type GradientCategory = "flat" | "gentle" | "moderate" | "steep" | "very_steep";

export interface ElevationStatistics {
  minMeters?: number;
  maxMeters?: number;
  rangeMeters?: number;
  averageMeters?: number;
  totalAscentMeters?: number;
  totalDescentMeters?: number;
}

/** A sampled segment steeper than 8% */
export interface GradientRisk {
  /** Segment end */
  coordinate?: Coordinate;
  /** Distance from the route start to the segment start */
  distanceKm?: number;
  /** Signed: positive climbs, negative descents */
  gradientPercent?: number;
  riskLevel?: "high" | "critical";
}

export interface ElevationProfilePayload {
  kind: "elevation-profile";
  statistics?: ElevationStatistics;
  /** Segment count per gradient category */
  gradientDistribution?: Partial<Record<GradientCategory, number>>;
  maxClimbPercent?: number;
  maxDescentPercent?: number;
  riskSegments?: GradientRisk[];
  overallRisk?: "low" | "medium" | "high" | "extreme";
  recommendations?: string[];
}

export interface RoadSuitability {
  coordinate: Coordinate;
  roadType?: string;
  suitability?: "suitable" | "caution" | "unsuitable";
  concerns?: string[];
}

export interface HeavyVehicleSuitabilityPayload {
  kind: "heavy-vehicle-suitability";
  vehicleClass?: VehicleClass;
  /** 0-100 */
  suitabilityScore?: number;
  roads?: RoadSuitability[];
  recommendations?: string[];
}

// ---------------------------------------------------------------------------
// Real-time
// ---------------------------------------------------------------------------

export interface SegmentCondition {
  segmentId: number;
  coordinate?: Coordinate;
  /** Travel time with traffic divided by free-flow travel time */
  travelTimeIndex?: number;
  congestionLevel?: CongestionLevel;
}

export interface TrafficIncident {
  type?: string;
  description?: string;
  severity?: string;
  estimatedDelay?: string;
  status?: string;
}

export interface LiveTrafficPayload {
  kind: "live-traffic";
  currentConditions?: SegmentCondition[];
  incidents?: TrafficIncident[];
  lastUpdated?: string;
}

export interface FuelStation {
  name?: string;
  address?: string;
  coordinate?: Coordinate;
  petrolPrice?: number;
  dieselPrice?: number;
  currency?: string;
}

export interface FuelPriceAnalysis {
  averagePetrolPrice?: number;
  petrolPriceRange?: number;
  cheapestStation?: string;
  currency?: string;
}

export interface FuelPricesPayload {
  kind: "fuel-prices";
  stations?: FuelStation[];
  priceAnalysis?: FuelPriceAnalysis;
  recommendations?: string[];
}

// ---------------------------------------------------------------------------
// Fleet
// ---------------------------------------------------------------------------

export interface FuelEfficiency {
  baseConsumptionRate?: number;
  adjustedConsumptionRate?: number;
  estimatedFuelLiters?: number;
  efficiencyRating?: "excellent" | "good" | "average" | "poor";
  weightAdjustmentFactor?: number;
  routeDifficultyFactor?: number;
}

export interface VehiclePerformancePayload {
  kind: "vehicle-performance";
  fuelEfficiency?: FuelEfficiency;
  recommendations?: string[];
}

export interface SafetyScores {
  overall?: number;
  turnSafety?: number;
  fatigueSafety?: number;
  rating?: "excellent" | "good" | "fair" | "poor";
  criticalFactors?: string[];
}

export interface DriverBehaviorPayload {
  kind: "driver-behavior";
  safetyScores?: SafetyScores;
}

export interface ComplianceTrackingPayload {
  kind: "compliance-tracking";
  /** 0-100 */
  complianceScore?: number;
  actionItems?: string[];
}

// ---------------------------------------------------------------------------
// Emergency
// ---------------------------------------------------------------------------

export interface ServicePoint {
  name?: string;
  address?: string;
  coordinate?: Coordinate;
}

export interface CoverageAnalysis {
  overall?: "excellent" | "good" | "limited" | "poor";
  /** 0-100 */
  score?: number;
  gaps?: string[];
}

export interface ResponsePlanPayload {
  kind: "response-plan";
  hospitals?: ServicePoint[];
  policeStations?: ServicePoint[];
  fireStations?: ServicePoint[];
  coverage?: CoverageAnalysis;
}

export interface CommunicationDeadZone {
  from: Coordinate;
  to: Coordinate;
  gapKm: number;
}

export interface ContactLevel {
  level: number;
  contactType: string;
  responseTime: string;
  purpose: string;
}

export interface CommunicationSystemPayload {
  kind: "communication-system";
  primaryChannels?: string[];
  backupMethods?: string[];
  deadZones?: CommunicationDeadZone[];
  contactHierarchy?: ContactLevel[];
}

// ---------------------------------------------------------------------------
// Location
// ---------------------------------------------------------------------------

export interface PopulationDensity {
  predominantType?: TerrainType;
  urbanPercentage?: number;
  routeCharacter?: "urban_corridor" | "mixed" | "rural_highway";
}

export interface DemographicsPayload {
  kind: "demographics";
  populationDensity?: PopulationDensity;
  localities?: string[];
}

export interface CommercialCenter {
  name?: string;
  address?: string;
  rating?: number;
}

export interface BusinessOpportunitiesPayload {
  kind: "business-opportunities";
  commercialCenters?: CommercialCenter[];
  investmentGrade?: "A" | "B" | "C";
  recommendedInvestments?: string[];
}

// ---------------------------------------------------------------------------
// Union
// ---------------------------------------------------------------------------

export type OperationPayload =
  | SeasonalCongestionPayload
  | ConstructionZonesPayload
  | CurrentConditionsPayload
  | SummerRisksPayload
  | MonsoonRisksPayload
  | TerrainClassificationPayload
  | ElevationProfilePayload
  | HeavyVehicleSuitabilityPayload
  | LiveTrafficPayload
  | FuelPricesPayload
  | VehiclePerformancePayload
  | DriverBehaviorPayload
  | ComplianceTrackingPayload
  | ResponsePlanPayload
  | CommunicationSystemPayload
  | DemographicsPayload
  | BusinessOpportunitiesPayload;

export type OperationKind = OperationPayload["kind"];
