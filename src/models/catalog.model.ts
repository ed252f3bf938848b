import type { AoiGeometry, CatalogFeature } from "./scene.model";

export interface PageLinks {
  _next?: string | null;
  _self?: string;
}

export interface SearchPage {
  features?: CatalogFeature[];
  _links?: PageLinks;
}

export interface Mosaic {
  id: string;
  name: string;
  first_acquired?: string;
  last_acquired?: string;
  interval?: string;
  [key: string]: unknown;
}

export interface MosaicPage {
  mosaics?: Mosaic[];
  _links?: PageLinks;
}

export interface ResultLinkPayload {
  name?: string;
  location?: string;
  expires_at?: string;
  delivery?: string;
}

/** Remote job state payload from the fulfillment service. */
export interface RemoteJobStatus {
  id: string;
  name?: string;
  state: string;
  error_hints?: string[];
  source_type?: string;
  _links?: {
    _self?: string;
    results?: ResultLinkPayload[];
  };
}

export interface ResultLink {
  readonly url: string;
  readonly filename: string;
}

export interface SceneOrderRequest {
  readonly name: string;
  readonly itemIds: readonly string[];
  readonly bundle: string;
  readonly clipAoi?: AoiGeometry;
}

export interface MosaicOrderRequest {
  readonly mosaicName: string;
  readonly aoi: AoiGeometry;
}

export type SubmissionRequest =
  | ({ kind: "scene" } & SceneOrderRequest)
  | ({ kind: "mosaic" } & MosaicOrderRequest);
