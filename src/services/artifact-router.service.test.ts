import { describe, it, expect } from "vitest";
import {
  mosaicDateSegment,
  resultSetFingerprint,
  routeMosaicArtifacts,
  routeSceneArtifacts,
  toDownloadTasks,
} from "./artifact-router.service";

const link = (filename: string, url = `https://files.test/${filename}`) => ({ url, filename });

describe("routeSceneArtifacts", () => {
  const links = [
    link("20240104_153045_12_2474_3B_AnalyticMS_SR_clip.tif"),
    link("20240102_101010_00_1111_3B_AnalyticMS_SR_clip.tif"),
    link("20240102_101010_00_1111_3B_udm2_clip.tif"),
    link("20240102_101010_00_1111_3B_AnalyticMS_metadata_clip.xml"),
    link("20240109_090000_00_2222_3B_AnalyticMS_SR_clip.tif"),
    link("20240109_090000_00_2222_3B_AnalyticMS_SR_clip.tif", "https://files.test/duplicate"),
    link("manifest_clip.tif"),
  ];

  it("should keep the earliest image per Sunday-start week", () => {
    const routing = routeSceneArtifacts(links, "Kisumu");

    expect(routing.artifacts).toEqual([
      {
        url: "https://files.test/20240102_101010_00_1111_3B_AnalyticMS_SR_clip.tif",
        relativePath:
          "planetscope analytic/four_bands/Kisumu/2024_01_02_101010_00_1111_3B_AnalyticMS_SR.tiff",
      },
      {
        url: "https://files.test/20240109_090000_00_2222_3B_AnalyticMS_SR_clip.tif",
        relativePath:
          "planetscope analytic/four_bands/Kisumu/2024_01_09_090000_00_2222_3B_AnalyticMS_SR.tiff",
      },
    ]);
    expect(routing.imagesFound).toBe(3);
    expect(routing.weeks).toBe(2);
    expect(routing.unparseable).toEqual(["manifest_clip.tif"]);
  });

  it("should route eight-band orders under their own folder", () => {
    const routing = routeSceneArtifacts([links[0]], "Kisumu", "eight_bands");
    expect(routing.artifacts[0].relativePath).toBe(
      "planetscope analytic/eight_bands/Kisumu/2024_01_04_153045_12_2474_3B_AnalyticMS_SR.tiff",
    );
  });

  it("should strip directories from result names", () => {
    const routing = routeSceneArtifacts(
      [link("job-1/PSScene/20240104_153045_12_2474_3B_AnalyticMS_SR_clip.tif")],
      "Kisumu",
    );
    expect(routing.artifacts).toHaveLength(1);
  });
});

describe("mosaicDateSegment", () => {
  it("should read year and month from the third and fourth tokens", () => {
    expect(mosaicDateSegment("global_monthly_2024_01_mosaic")).toBe("2024_01");
  });

  it("should fall back for names of another shape", () => {
    expect(mosaicDateSegment("custom_mosaic")).toBe("unknown_date");
    expect(mosaicDateSegment("global_monthly_24_01_mosaic")).toBe("unknown_date");
  });
});

describe("routeMosaicArtifacts", () => {
  it("should route every file under AOI and mosaic month", () => {
    const artifacts = routeMosaicArtifacts(
      [link("L15-1234E-5678N.tif"), link("L15-1234E-5679N.tif"), link("L15-1234E-5679N.tif")],
      "Kisumu",
      "global_monthly_2024_01_mosaic",
    );

    expect(artifacts.map((a) => a.relativePath)).toEqual([
      "basemaps/Kisumu/2024_01/L15-1234E-5678N.tif",
      "basemaps/Kisumu/2024_01/L15-1234E-5679N.tif",
    ]);
  });
});

describe("AOI path segments", () => {
  it("should keep scene and mosaic routes under one AOI segment", () => {
    const scene = routeSceneArtifacts([link("20240104_153045_12_2474_3B_AnalyticMS_SR_clip.tif")], "../Kisumu");
    const mosaic = routeMosaicArtifacts([link("L15-1234E-5678N.tif")], "..", "global_monthly_2024_01_mosaic");

    expect(scene.artifacts[0].relativePath).toBe(
      "planetscope analytic/four_bands/.._Kisumu/2024_01_04_153045_12_2474_3B_AnalyticMS_SR.tiff",
    );
    expect(mosaic[0].relativePath).toBe("basemaps/_/2024_01/L15-1234E-5678N.tif");
  });
});

describe("toDownloadTasks", () => {
  const artifacts = [{ url: "https://files.test/a", relativePath: "basemaps/Kisumu/2024_01/a.tif" }];

  it("should use the relative path as the object key", () => {
    expect(toDownloadTasks(artifacts, { kind: "object_store" })).toEqual([
      { sourceUrl: "https://files.test/a", destination: "basemaps/Kisumu/2024_01/a.tif" },
    ]);
  });

  it("should resolve under the root for filesystem destinations", () => {
    expect(toDownloadTasks(artifacts, { kind: "filesystem", root: "/data/out" })).toEqual([
      { sourceUrl: "https://files.test/a", destination: "/data/out/basemaps/Kisumu/2024_01/a.tif" },
    ]);
  });
});

describe("resultSetFingerprint", () => {
  it("should ignore link order and signed URLs", () => {
    const first = resultSetFingerprint([link("a.tif", "https://x/1?sig=1"), link("b.tif", "https://x/2?sig=1")]);
    const second = resultSetFingerprint([link("b.tif", "https://x/2?sig=2"), link("a.tif", "https://x/1?sig=2")]);
    expect(first).toBe(second);
  });

  it("should change when the set of files changes", () => {
    expect(resultSetFingerprint([link("a.tif")])).not.toBe(
      resultSetFingerprint([link("a.tif"), link("b.tif")]),
    );
  });
});
