import path from "path";
import { createHash } from "crypto";
import logger from "../utils/logger";
import { safeBasename, safePathSegment } from "../utils/sanitizer";
import {
  extractDateFromFilename,
  extractSceneId,
  weekStartKey,
} from "../utils/dates";
import { ValidationError } from "../utils/errors";
import type { ResultLink } from "../models/catalog.model";
import type { Destination, DownloadTask } from "../models/download.model";
import type { BandOption } from "../models/scene.model";

export interface RoutedArtifact {
  readonly url: string;
  /** Path relative to the destination root (doubles as the object key). */
  readonly relativePath: string;
}

export interface SceneRouting {
  artifacts: RoutedArtifact[];
  imagesFound: number;
  weeks: number;
  unparseable: string[];
}

export const SCENE_ROOT = "planetscope analytic";
export const MOSAIC_ROOT = "basemaps";
export const UNKNOWN_MOSAIC_DATE = "unknown_date";

interface SceneImage {
  url: string;
  date: string;
  weekStart: string;
  sceneId: string;
}

function isSceneImage(filename: string): boolean {
  const lower = filename.toLowerCase();
  return lower.endsWith(".tif") && !lower.includes("udm") && !lower.endsWith(".xml");
}

/**
 * Scene orders: one image per Sunday-start week (the earliest-dated one),
 * renamed to `{date}_{sceneId}.tiff` under the AOI's folder.
 */
export function routeSceneArtifacts(
  links: readonly ResultLink[],
  aoiLabel: string,
  bands: BandOption = "four_bands",
): SceneRouting {
  const seen = new Set<string>();
  const images: SceneImage[] = [];
  const unparseable: string[] = [];

  for (const link of links) {
    const filename = safeBasename(link.filename);
    if (seen.has(filename)) continue;
    seen.add(filename);

    if (!isSceneImage(filename)) continue;

    const date = extractDateFromFilename(filename);
    if (!date) {
      logger.warn(`Could not extract date from: ${filename}`);
      unparseable.push(filename);
      continue;
    }

    let weekStart: string;
    try {
      weekStart = weekStartKey(date);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.warn(`Invalid date in artifact name: ${filename}`);
      unparseable.push(filename);
      continue;
    }

    images.push({
      url: link.url,
      date,
      weekStart,
      sceneId: extractSceneId(filename) ?? "unknown",
    });
  }

  images.sort(
    (a, b) => a.weekStart.localeCompare(b.weekStart) || a.date.localeCompare(b.date),
  );

  const weeks = new Map<string, SceneImage>();
  for (const image of images) {
    if (!weeks.has(image.weekStart)) {
      weeks.set(image.weekStart, image);
    }
  }

  const prefix = `${SCENE_ROOT}/${bands}/${safePathSegment(aoiLabel)}`;
  const artifacts = [...weeks.values()].map((image) => ({
    url: image.url,
    relativePath: `${prefix}/${image.date}_${image.sceneId}.tiff`,
  }));

  logger.info(`Found ${images.length} images across ${weeks.size} weeks for ${aoiLabel}`);

  return { artifacts, imagesFound: images.length, weeks: weeks.size, unparseable };
}

/** `YYYY_MM` encoded in tokens 3 and 4 of a mosaic name, or a sentinel. */
export function mosaicDateSegment(mosaicName: string): string {
  const parts = mosaicName.split("_");
  if (parts.length >= 4 && parts[2].length === 4) {
    return `${parts[2]}_${parts[3]}`;
  }
  return UNKNOWN_MOSAIC_DATE;
}

/** Mosaic orders: every result file, under AOI and mosaic month. */
export function routeMosaicArtifacts(
  links: readonly ResultLink[],
  aoiLabel: string,
  mosaicName: string,
): RoutedArtifact[] {
  const prefix = `${MOSAIC_ROOT}/${safePathSegment(aoiLabel)}/${mosaicDateSegment(mosaicName)}`;
  const seen = new Set<string>();
  const artifacts: RoutedArtifact[] = [];

  for (const link of links) {
    const filename = safeBasename(link.filename);
    if (seen.has(filename)) continue;
    seen.add(filename);
    artifacts.push({ url: link.url, relativePath: `${prefix}/${filename}` });
  }

  return artifacts;
}

export function toDownloadTasks(
  artifacts: readonly RoutedArtifact[],
  destination: Destination,
): DownloadTask[] {
  return artifacts.map((artifact) => ({
    sourceUrl: artifact.url,
    destination:
      destination.kind === "object_store"
        ? artifact.relativePath
        : path.join(destination.root, ...artifact.relativePath.split("/")),
  }));
}

/**
 * Identity of a result set by file names. Locations are signed and change
 * between status calls; names do not.
 */
export function resultSetFingerprint(links: readonly ResultLink[]): string {
  const names = links.map((link) => link.filename).sort();
  return createHash("sha256").update(names.join("\n")).digest("hex");
}
