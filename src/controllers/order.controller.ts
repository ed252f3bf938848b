import { Request, Response } from "express";
import Joi from "joi";
import type AcquisitionService from "../services/acquisition.service";
import type { OrderParams, OrderQuery } from "../services/acquisition.service";
import { sendError } from "../middleware/error.middleware";
import {
  aoiLabelSchema,
  bandsSchema,
  cadenceSchema,
  checkSchema,
  geometrySchema,
  isoDate,
  jobIdSchema,
  statusSchema,
  toDestination,
  validate,
} from "./schemas";

const submitOrderSchema = Joi.object<OrderParams>({
  aoiLabel: aoiLabelSchema.required(),
  aoi: geometrySchema.required(),
  startDate: isoDate.required(),
  endDate: isoDate.required(),
  cadence: cadenceSchema,
  bands: bandsSchema,
  bundleOverride: Joi.string().optional(),
  minCoveragePct: Joi.number().min(0).max(100).optional(),
  clip: Joi.boolean().default(true),
  skipIfExists: Joi.boolean().default(false),
});

const orderQuerySchema = Joi.object<OrderQuery>({
  aoi: Joi.string().max(128),
  status: statusSchema,
  batchId: Joi.string().uuid(),
})
  .or("aoi", "status", "batchId")
  .oxor("aoi", "status", "batchId");

export function createOrderController(acquisition: AcquisitionService) {
  return {
    async submitOrder(req: Request, res: Response): Promise<void> {
      try {
        const params = validate(submitOrderSchema, req.body || {}, res, "request body");
        if (!params) return;

        const outcome = await acquisition.submitOrder(params);
        switch (outcome.status) {
          case "submitted":
            res.status(201).json({
              status: outcome.status,
              order: outcome.order,
              scenesFound: outcome.preview.scenesFound,
            });
            return;
          case "skipped":
            res.status(200).json(outcome);
            return;
          case "noScenes":
            res.status(200).json(outcome);
            return;
        }
      } catch (error) {
        sendError(res, error, "submitOrder");
      }
    },

    async checkOrder(req: Request, res: Response): Promise<void> {
      try {
        const { error: jobIdError } = jobIdSchema.validate(req.params.jobId);
        if (jobIdError) {
          res.status(400).json({ error: "Invalid jobId format", details: jobIdError.message });
          return;
        }
        const body = validate(checkSchema, req.body || {}, res, "request body");
        if (!body) return;

        const check = await acquisition.checkOrder(req.params.jobId, {
          destination: toDestination(body.output),
          overwrite: body.overwrite,
          force: body.force,
        });
        res.status(200).json(check);
      } catch (error) {
        sendError(res, error, "checkOrder");
      }
    },

    async getOrder(req: Request, res: Response): Promise<void> {
      try {
        const { error } = jobIdSchema.validate(req.params.jobId);
        if (error) {
          res.status(400).json({ error: "Invalid jobId format", details: error.message });
          return;
        }
        res.status(200).json(await acquisition.getOrder(req.params.jobId));
      } catch (error) {
        sendError(res, error, "getOrder");
      }
    },

    async listOrders(req: Request, res: Response): Promise<void> {
      try {
        const query = validate(orderQuerySchema, req.query, res, "query");
        if (!query) return;
        const orders = await acquisition.listOrders(query);
        res.status(200).json({ orders, count: orders.length });
      } catch (error) {
        sendError(res, error, "listOrders");
      }
    },

    async listPending(req: Request, res: Response): Promise<void> {
      try {
        const orders = await acquisition.listPending();
        res.status(200).json({ orders, count: orders.length });
      } catch (error) {
        sendError(res, error, "listPending");
      }
    },

    async stats(req: Request, res: Response): Promise<void> {
      try {
        res.status(200).json(await acquisition.stats());
      } catch (error) {
        sendError(res, error, "stats");
      }
    },
  };
}

export async function healthCheck(req: Request, res: Response): Promise<void> {
  res.status(200).json({ status: "healthy", timestamp: new Date().toISOString() });
}
