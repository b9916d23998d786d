/**
 * External-service secrets.
 *
 * Every secret is optional. A provider whose primary credential is absent is
 * skipped; secondary credentials only narrow what an eligible provider can do.
 */

export const CREDENTIAL_NAMES = [
  "googleMaps",
  "tomtom",
  "here",
  "openweather",
  "visualcrossing",
  "tomorrowIo",
  "mapbox",
  "emergencyApi",
] as const;

export type CredentialName = (typeof CREDENTIAL_NAMES)[number];

/** Mapping from credential name to optional secret, scoped to one run */
export type Credentials = Readonly<Partial<Record<CredentialName, string>>>;
