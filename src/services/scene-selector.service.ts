import logger from "../utils/logger";
import { calculateCoverage } from "../utils/geometry";
import { ValidationError } from "../utils/errors";
import { intervalKey, parseIsoDate } from "../utils/dates";
import type {
  AoiGeometry,
  Cadence,
  Scene,
  SelectedScene,
} from "../models/scene.model";

export type CoverageFn = (footprint: AoiGeometry, aoi: AoiGeometry) => number;

function isBetter(candidate: SelectedScene, current: SelectedScene): boolean {
  if (candidate.coveragePct !== current.coveragePct) {
    return candidate.coveragePct > current.coveragePct;
  }
  if (candidate.scene.acquired !== current.scene.acquired) {
    return candidate.scene.acquired < current.scene.acquired;
  }
  return candidate.scene.id < current.scene.id;
}

/**
 * Reduces a flat result set to the best-covering scene per cadence interval.
 * Scenes under `minCoveragePct` are dropped before grouping; ties on
 * coverage go to the earliest acquisition.
 */
export function selectScenes(
  scenes: readonly Scene[],
  aoi: AoiGeometry,
  cadence: Cadence,
  minCoveragePct: number,
  coverage: CoverageFn = calculateCoverage,
): SelectedScene[] {
  const best = new Map<string, SelectedScene>();
  let belowThreshold = 0;

  for (const scene of scenes) {
    const coveragePct = coverage(scene.footprint, aoi);
    if (coveragePct < minCoveragePct) {
      belowThreshold++;
      continue;
    }

    let key: string;
    try {
      key = intervalKey(parseIsoDate(scene.acquiredDate, scene.id), cadence);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.warn(`Skipping scene with unreadable acquisition date: ${error.message}`);
      continue;
    }
    const candidate: SelectedScene = { scene, coveragePct, intervalKey: key };
    const current = best.get(key);
    if (!current || isBetter(candidate, current)) {
      best.set(key, candidate);
    }
  }

  logger.debug(
    `Selected ${best.size} of ${scenes.length} scenes (${cadence}), ${belowThreshold} below ${minCoveragePct}% coverage`,
  );

  return [...best.values()];
}

/** Presentation order: by interval, then acquisition. */
export function sortSelection(selected: readonly SelectedScene[]): SelectedScene[] {
  return [...selected].sort(
    (a, b) =>
      a.intervalKey.localeCompare(b.intervalKey) ||
      a.scene.acquired.localeCompare(b.scene.acquired),
  );
}
