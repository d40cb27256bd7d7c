/**
 * Filename derivation for downloaded assets
 */

import type { House } from "../types";

/**
 * Build `{id}-{homeowner}-{address}.{extension}`.
 * Path separators in every part are replaced so the name stays inside the
 * output directory.
 */
export function buildAssetFilename(house: House, extension: string): string {
  const homeowner = stripSeparators(house.homeowner);
  const address = stripSeparators(house.address);
  return `${house.id}-${homeowner}-${address}.${stripSeparators(extension)}`;
}

function stripSeparators(value: string): string {
  return value.replace(/[/\\]/g, "_");
}
