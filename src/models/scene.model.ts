import type { MultiPolygon, Polygon } from "geojson";

export type Cadence = "daily" | "weekly" | "monthly";

export const CADENCES: readonly Cadence[] = ["daily", "weekly", "monthly"];

export type BandOption = "four_bands" | "eight_bands";

export type AoiGeometry = Polygon | MultiPolygon;

/**
 * Catalog item as returned by the quick-search endpoint. Items without a
 * footprint or acquisition time do occur and are dropped by `toScene`.
 */
export interface CatalogFeature {
  id: string;
  type?: string;
  geometry?: AoiGeometry | null;
  properties?: {
    acquired?: string;
    cloud_cover?: number;
    item_type?: string;
    quality_category?: string;
    [key: string]: unknown;
  };
  _links?: {
    _self?: string;
    assets?: string;
    thumbnail?: string;
  };
}

export interface Scene {
  readonly id: string;
  readonly acquired: string;
  readonly acquiredDate: string;
  readonly cloudCover: number;
  readonly footprint: AoiGeometry;
  readonly links: {
    readonly self?: string;
    readonly assets?: string;
    readonly thumbnail?: string;
  };
}

export interface SelectedScene {
  readonly scene: Scene;
  readonly coveragePct: number;
  readonly intervalKey: string;
}

export interface ProductBundle {
  /** Bundle the catalog is searched with. */
  readonly searchBundle: string;
  /** Bundle name the fulfillment service expects. */
  readonly orderBundle: string;
}

export interface SearchFilters {
  readonly maxCloudCover: number;
  readonly qualityCategories: readonly string[];
  readonly itemType: string;
}

/** Scene for a catalog item, or null when the item lacks a footprint or time. */
export function toScene(feature: CatalogFeature): Scene | null {
  const acquired = feature.properties?.acquired;
  if (typeof acquired !== "string" || !feature.geometry) {
    return null;
  }
  return {
    id: feature.id,
    acquired,
    acquiredDate: acquired.slice(0, 10),
    cloudCover: feature.properties?.cloud_cover ?? 0,
    footprint: feature.geometry,
    links: {
      self: feature._links?._self,
      assets: feature._links?.assets,
      thumbnail: feature._links?.thumbnail,
    },
  };
}
