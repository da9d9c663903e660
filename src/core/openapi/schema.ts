/**
 * The part of an OpenAPI document the validator reads.
 */
import { z } from 'zod';

/** A `paths` object: template keys mapped to path items. */
export const PathsObjectSchema = z.record(z.string(), z.unknown());

/** OpenAPI document; only `paths` is required here. */
export const OpenApiDocumentSchema = z
  .object({
    openapi: z.string().optional(),
    info: z
      .object({
        title: z.string().optional(),
        version: z.string().optional(),
      })
      .passthrough()
      .optional(),
    paths: PathsObjectSchema,
  })
  .passthrough();

export type OpenApiDocument = z.infer<typeof OpenApiDocumentSchema>;
