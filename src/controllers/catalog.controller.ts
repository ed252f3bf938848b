import { Request, Response } from "express";
import Joi from "joi";
import type AcquisitionService from "../services/acquisition.service";
import type { SearchParams } from "../services/acquisition.service";
import type { AoiGeometry } from "../models/scene.model";
import { sendError } from "../middleware/error.middleware";
import {
  aoiLabelSchema,
  bandsSchema,
  cadenceSchema,
  geometrySchema,
  isoDate,
  validate,
} from "./schemas";

const searchSchema = Joi.object<SearchParams>({
  aoi: geometrySchema.required(),
  startDate: isoDate.required(),
  endDate: isoDate.required(),
  cadence: cadenceSchema,
  bands: bandsSchema,
  bundleOverride: Joi.string().optional(),
  minCoveragePct: Joi.number().min(0).max(100).optional(),
});

const mosaicQuerySchema = Joi.object<{ start?: string; end?: string }>({
  start: isoDate,
  end: isoDate,
}).and("start", "end");

const mosaicOrderSchema = Joi.object<{ mosaicName: string; aoiLabel: string; aoi: AoiGeometry }>({
  mosaicName: Joi.string().max(255).required(),
  aoiLabel: aoiLabelSchema.required(),
  aoi: geometrySchema.required(),
});

export function createCatalogController(acquisition: AcquisitionService) {
  return {
    async searchScenes(req: Request, res: Response): Promise<void> {
      try {
        const params = validate(searchSchema, req.body || {}, res, "request body");
        if (!params) return;

        const preview = await acquisition.searchScenes(params);
        res.status(200).json({
          bundle: preview.bundle,
          aoiAreaSqKm: preview.aoiAreaSqKm,
          scenesFound: preview.scenesFound,
          quotaHectares: preview.quotaHectares,
          selected: preview.selected.map((selection) => ({
            id: selection.scene.id,
            acquired: selection.scene.acquired,
            cloudCover: selection.scene.cloudCover,
            coveragePct: selection.coveragePct,
            intervalKey: selection.intervalKey,
          })),
        });
      } catch (error) {
        sendError(res, error, "searchScenes");
      }
    },

    async listMosaics(req: Request, res: Response): Promise<void> {
      try {
        const query = validate(mosaicQuerySchema, req.query, res, "query");
        if (!query) return;

        const mosaics = await acquisition.listMosaics(query.start, query.end);
        res.status(200).json({ mosaics, count: mosaics.length });
      } catch (error) {
        sendError(res, error, "listMosaics");
      }
    },

    async orderMosaic(req: Request, res: Response): Promise<void> {
      try {
        const params = validate(mosaicOrderSchema, req.body || {}, res, "request body");
        if (!params) return;

        const order = await acquisition.orderMosaic(params);
        res.status(201).json({ order });
      } catch (error) {
        sendError(res, error, "orderMosaic");
      }
    },
  };
}
