import type { BandOption, ProductBundle } from "../models/scene.model";

const FOUR_BAND_SR = "ortho_analytic_4b_sr";
const EIGHT_BAND_SR = "ortho_analytic_8b_sr";

/** Eight-band surface reflectance is only published from this year on. */
const EIGHT_BAND_FIRST_YEAR = 2021;

const ORDER_BUNDLES: Record<string, string> = {
  [FOUR_BAND_SR]: "analytic_sr_udm2",
  [EIGHT_BAND_SR]: "analytic_8b_sr_udm2",
};

export function resolveBundle(
  bands: BandOption,
  startYear: number,
  override?: string,
): ProductBundle {
  let searchBundle: string;
  if (override) {
    searchBundle = override;
  } else if (bands === "four_bands") {
    searchBundle = FOUR_BAND_SR;
  } else {
    searchBundle = startYear >= EIGHT_BAND_FIRST_YEAR ? EIGHT_BAND_SR : FOUR_BAND_SR;
  }

  return {
    searchBundle,
    orderBundle: ORDER_BUNDLES[searchBundle] ?? searchBundle,
  };
}
