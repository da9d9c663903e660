/**
 * Configuration file schema.
 */
import { z } from 'zod';
import { SERVICE_ROOT_PATHS, DEFAULT_MAX_REFERENCE_DEPTH } from '../reachability/constants.js';

/**
 * Make an object field optional and fill its inner defaults when missing.
 * Both undefined and null are treated as "missing".
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** How the crawler authenticates. */
export const AuthModeSchema = z.enum(['session', 'basic']);

/** Service connection and crawl settings. */
export const ServiceSettingsSchema = z.object({
  /** Service root path the crawl starts from */
  root: z.string().default('/redfish/v1/'),
  auth: AuthModeSchema.default('session'),
  /** Per-request timeout */
  timeout_ms: z.number().int().min(1).default(30000),
  /** Stop after this many resources */
  max_resources: z.number().int().min(1).default(10000),
});

/** Validation engine settings. */
export const ValidationSettingsSchema = z.object({
  service_root_paths: z.array(z.string()).min(1).default([...SERVICE_ROOT_PATHS]),
  /** Only honour an exception marker on the property directly holding the reference */
  strict_markers: z.boolean().default(false),
  max_reference_depth: z.number().int().min(1).default(DEFAULT_MAX_REFERENCE_DEPTH),
  extra_exception_markers: z.array(z.string()).default([]),
  extra_skipped_properties: z.array(z.string()).default([]),
});

/** Report file formats. */
export const ReportFormatSchema = z.enum(['html', 'json']);

/** Report settings. */
export const ReportSettingsSchema = z.object({
  formats: z.array(ReportFormatSchema).default(['html']),
  /** Output directory; null writes to the working directory */
  logdir: z.string().nullable().default(null),
  title: z.string().default('Redfish URI Test Report'),
  /** Image data URI shown in the HTML report header */
  logo: z.string().nullable().default(null),
});

/** Full configuration. */
export const ConfigSchema = z.object({
  service: withDefaults(ServiceSettingsSchema),
  validation: withDefaults(ValidationSettingsSchema),
  report: withDefaults(ReportSettingsSchema),
});

export type AuthMode = z.infer<typeof AuthModeSchema>;
export type ReportFormat = z.infer<typeof ReportFormatSchema>;
export type ServiceSettings = z.infer<typeof ServiceSettingsSchema>;
export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>;
export type ReportSettings = z.infer<typeof ReportSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
