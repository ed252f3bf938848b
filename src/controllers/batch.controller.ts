import { Request, Response } from "express";
import Joi from "joi";
import type AcquisitionService from "../services/acquisition.service";
import type { BatchParams } from "../services/acquisition.service";
import { sendError } from "../middleware/error.middleware";
import {
  aoiLabelSchema,
  bandsSchema,
  cadenceSchema,
  checkSchema,
  geometrySchema,
  toDestination,
  validate,
} from "./schemas";

const MAX_ROWS = 500;

// Row dates are validated per row by the service so one bad row does not
// reject the whole batch.
const batchSchema = Joi.object<BatchParams>({
  rows: Joi.array()
    .items(
      Joi.object({
        aoiLabel: aoiLabelSchema.required(),
        startDate: Joi.string().required(),
        endDate: Joi.string().required(),
        geometry: geometrySchema.required(),
      }),
    )
    .min(1)
    .max(MAX_ROWS)
    .required(),
  maxMonths: Joi.number().integer().min(1).optional(),
  cadence: cadenceSchema,
  bands: bandsSchema,
  bundleOverride: Joi.string().optional(),
  minCoveragePct: Joi.number().min(0).max(100).optional(),
  dryRun: Joi.boolean().default(false),
  skipExisting: Joi.boolean().default(true),
});

const batchIdSchema = Joi.string().uuid().required();

export function createBatchController(acquisition: AcquisitionService) {
  return {
    async submitBatch(req: Request, res: Response): Promise<void> {
      try {
        const params = validate(batchSchema, req.body || {}, res, "request body");
        if (!params) return;

        const report = await acquisition.submitBatch(params);
        res.status(params.dryRun ? 200 : 201).json(report);
      } catch (error) {
        sendError(res, error, "submitBatch");
      }
    },

    async checkBatch(req: Request, res: Response): Promise<void> {
      try {
        const { error: idError } = batchIdSchema.validate(req.params.batchId);
        if (idError) {
          res.status(400).json({ error: "Invalid batchId format", details: idError.message });
          return;
        }
        const body = validate(checkSchema, req.body || {}, res, "request body");
        if (!body) return;

        const report = await acquisition.checkBatch(req.params.batchId, {
          destination: toDestination(body.output),
          overwrite: body.overwrite,
          force: body.force,
        });
        res.status(report.found ? 200 : 404).json(report);
      } catch (error) {
        sendError(res, error, "checkBatch");
      }
    },

    async listBatches(req: Request, res: Response): Promise<void> {
      try {
        const batches = await acquisition.listBatches();
        res.status(200).json({ batches, count: batches.length });
      } catch (error) {
        sendError(res, error, "listBatches");
      }
    },
  };
}
