/**
 * @route-intel/types
 *
 * Shared domain types for the route intelligence report pipeline.
 *
 * - Route: The immutable description of the route under analysis
 * - Credentials: Optional secrets for external services
 * - Intelligence: Payloads returned by provider operations
 * - Report: Sections, statuses and the run summary
 */

export * from "./geo.js";
export * from "./route.js";
export * from "./credentials.js";
export * from "./intelligence.js";
export * from "./report.js";
