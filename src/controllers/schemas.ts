import { Response } from "express";
import Joi from "joi";
import { CADENCES, AoiGeometry } from "../models/scene.model";
import { ORDER_STATUSES } from "../models/order.model";
import type { Destination } from "../models/download.model";

const position = Joi.array().items(Joi.number()).min(2);
const ring = Joi.array().items(position).min(4);

export const geometrySchema = Joi.alternatives().try(
  Joi.object<AoiGeometry>({
    type: Joi.string().valid("Polygon").required(),
    coordinates: Joi.array().items(ring).min(1).required(),
  }).unknown(true),
  Joi.object<AoiGeometry>({
    type: Joi.string().valid("MultiPolygon").required(),
    coordinates: Joi.array().items(Joi.array().items(ring).min(1)).min(1).required(),
  }).unknown(true),
);

export const isoDate = Joi.string().pattern(/^\d{4}-\d{2}-\d{2}$/);

export const aoiLabelSchema = Joi.string()
  .pattern(/^[a-zA-Z0-9_-]+$/)
  .max(128);

export const cadenceSchema = Joi.string()
  .valid(...CADENCES)
  .default("weekly");

export const bandsSchema = Joi.string()
  .valid("four_bands", "eight_bands")
  .default("four_bands");

export const statusSchema = Joi.string().valid(...ORDER_STATUSES);

export const jobIdSchema = Joi.string()
  .pattern(/^[a-zA-Z0-9_-]+$/)
  .max(128)
  .required();

export interface CheckBody {
  output: string;
  overwrite: boolean;
  force: boolean;
}

/** `output` is "s3" for the object store, otherwise a local directory. */
export const checkSchema = Joi.object<CheckBody>({
  output: Joi.string().default("s3"),
  overwrite: Joi.boolean().default(false),
  force: Joi.boolean().default(false),
});

export function toDestination(output: string): Destination {
  return output.toLowerCase() === "s3"
    ? { kind: "object_store" }
    : { kind: "filesystem", root: output };
}

/**
 * Validates `input` against `schema`, answering 400 on failure.
 * Returns the converted value, or null once the response is sent.
 */
export function validate<T>(
  schema: Joi.ObjectSchema<T>,
  input: unknown,
  res: Response,
  label: string,
): T | null {
  const { error, value } = schema.validate(input, { abortEarly: false });
  if (error) {
    res.status(400).json({ error: `Invalid ${label}`, details: error.message });
    return null;
  }
  return value;
}
