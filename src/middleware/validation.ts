/**
 * Request validation
 *
 * zod schemas for bodies, queries and params.
 * parseRequest throws ValidationError (400 VALIDATION_FAILED).
 *
 * SOLID:
 * - SRP: request validation only
 */

import { z } from "zod";
import { CatalogAttributesSchema } from "@/core/domain/ProductRecord";
import { ValidationError } from "@/core/errors/AppError";

const optionalText = z.string().trim().optional();

const flag = z
  .enum(["true", "false", "yes", "no", "Yes", "No"])
  .transform((val) => val === "true" || val.toLowerCase() === "yes")
  .optional();

const positiveId = z.coerce.number().int().positive();

export const ProductBodySchema = CatalogAttributesSchema;

export const ProductListQuerySchema = z.object({
  asin: optionalText,
  url: optionalText,
  collectionName: optionalText,
  size: optionalText,
  color: optionalText,
  customer: optionalText,
  price: optionalText,
  isRedirect: flag,
  isUnavailable: flag,
  orderable: flag,
  notCheckedSince: optionalText,
});

export const IdParamSchema = z.object({
  id: positiveId,
});

export const DeleteProductsBodySchema = z.object({
  ids: z.array(positiveId).min(1, "ids must contain at least one id"),
});

export const CheckRequestBodySchema = z
  .object({
    ids: z.array(positiveId).optional(),
    urls: z.array(z.string().trim().min(1)).optional(),
  })
  .refine((body) => (body.ids?.length ?? 0) + (body.urls?.length ?? 0) > 0, {
    message: "Select at least one product (ids or urls)",
  });

export const CheckRequestQuerySchema = z.object({
  wait: z
    .enum(["true", "false"])
    .transform((val) => val === "true")
    .optional(),
});

export const JobIdParamSchema = z.object({
  jobId: z.string().uuid(),
});

export const SummaryQuerySchema = z.object({
  customer: optionalText,
});

/**
 * @throws {ValidationError} one message per issue
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parseResult = schema.safeParse(value);

  if (!parseResult.success) {
    const details = parseResult.error.errors.map((e) =>
      e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message,
    );
    throw new ValidationError("Validation failed", details);
  }

  return parseResult.data;
}
