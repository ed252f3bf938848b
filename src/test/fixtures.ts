import type { Polygon } from "geojson";
import type { Scene } from "../models/scene.model";
import type { Order } from "../models/order.model";

/** Axis-aligned lon/lat rectangle. */
export function rect(west: number, south: number, east: number, north: number): Polygon {
  return {
    type: "Polygon",
    coordinates: [
      [
        [west, south],
        [east, south],
        [east, north],
        [west, north],
        [west, south],
      ],
    ],
  };
}

/** One-degree AOI at the equator. */
export const AOI = rect(0, 0, 1, 1);

/**
 * Footprint covering `pct` percent of AOI. Meridian-aligned strips keep
 * geodesic area proportional to the longitude span.
 */
export function footprintCovering(pct: number): Polygon {
  const west = 1 - pct / 100;
  return rect(west, -0.5, west + 1, 1.5);
}

export function makeScene(id: string, acquired: string, footprint: Polygon = AOI): Scene {
  return {
    id,
    acquired,
    acquiredDate: acquired.slice(0, 10),
    cloudCover: 0,
    footprint,
    links: {},
  };
}

export function makeOrder(overrides: Partial<Order> & { jobId: string }): Order {
  return {
    aoiLabel: "Kisumu",
    kind: "scene",
    startDate: "2024-01-01",
    endDate: "2024-03-31",
    status: "queued",
    clipped: true,
    createdAt: "2024-04-01T00:00:00.000Z",
    ...overrides,
  };
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of items) {
    results.push(item);
  }
  return results;
}
