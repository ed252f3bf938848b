import { area, feature, featureCollection, intersect } from "@turf/turf";
import type { AoiGeometry } from "../models/scene.model";
import { ValidationError } from "./errors";

/** Geodesic area in square kilometres. */
export function areaSqKm(geometry: AoiGeometry): number {
  return area(feature(geometry)) / 1e6;
}

export function assertNonEmptyAoi(geometry: AoiGeometry, item?: string): void {
  if (!geometry.coordinates.length || area(feature(geometry)) <= 0) {
    throw new ValidationError("AOI geometry is empty", item);
  }
}

/** Share of the AOI covered by the footprint, 0-100. */
export function calculateCoverage(
  footprint: AoiGeometry,
  aoi: AoiGeometry,
): number {
  const aoiArea = area(feature(aoi));
  if (aoiArea <= 0) {
    return 0;
  }

  const overlap = intersect(featureCollection([feature(footprint), feature(aoi)]));
  if (!overlap) {
    return 0;
  }

  return (area(overlap) / aoiArea) * 100;
}
