export const STORE_LOCATION_PATTERN = /^[a-z_][a-z0-9_]{0,62}$/;

/**
 * Store locations are used as database identifiers, so only plain lowercase
 * identifiers are accepted.
 */
export function isValidStoreLocation(location: string): boolean {
  return STORE_LOCATION_PATTERN.test(location);
}

export function assertStoreLocation(location: string): string {
  if (!isValidStoreLocation(location)) {
    throw new Error(`Invalid store location "${location}"`);
  }
  return location;
}

/**
 * Rewrites the database name of a Postgres connection URL.
 */
export function connectionStringFor(templateUrl: string, location: string): string {
  const url = new URL(templateUrl);
  url.pathname = `/${assertStoreLocation(location)}`;
  return url.toString();
}
