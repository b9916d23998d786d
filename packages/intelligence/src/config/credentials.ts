/**
 * Credentials from the process environment.
 */

import { CREDENTIAL_NAMES, type CredentialName, type Credentials } from "@route-intel/types";

/** Environment variable holding each credential */
export const CREDENTIAL_ENV: Record<CredentialName, string> = {
  googleMaps: "GOOGLE_MAPS_API_KEY",
  tomtom: "TOMTOM_API_KEY",
  here: "HERE_API_KEY",
  openweather: "OPENWEATHER_API_KEY",
  visualcrossing: "VISUALCROSSING_API_KEY",
  tomorrowIo: "TOMORROW_IO_API_KEY",
  mapbox: "MAPBOX_API_KEY",
  emergencyApi: "EMERGENCY_API_KEY",
};

/** Read every credential from the environment; blank values are left out */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const credentials: Partial<Record<CredentialName, string>> = {};
  for (const name of CREDENTIAL_NAMES) {
    const value = env[CREDENTIAL_ENV[name]]?.trim();
    if (value) credentials[name] = value;
  }
  return credentials;
}

/**
 * Overlay per-request credentials on a base set. A blank override does not
 * clear the base secret.
 */
export function mergeCredentials(base: Credentials, override: Credentials = {}): Credentials {
  const merged: Partial<Record<CredentialName, string>> = { ...base };
  for (const name of CREDENTIAL_NAMES) {
    const value = override[name]?.trim();
    if (value) merged[name] = value;
  }
  return merged;
}
