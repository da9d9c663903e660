/**
 * Loads the path templates declared by an OpenAPI document.
 */
import { loadYaml, formatZodError } from '../../utils/yaml.js';
import { ErrorCodes, OpenApiError, SystemError } from '../../utils/errors.js';
import { PathSet } from '../paths/matcher.js';
import { OpenApiDocumentSchema, type OpenApiDocument } from './schema.js';

/** Paths-object keys starting with this prefix are extensions, not templates. */
const EXTENSION_PREFIX = 'x-';

/**
 * Validate a parsed document.
 * @throws OpenApiError when the document has no `paths` object
 */
export function parseOpenApiDocument(data: unknown, source = '<memory>'): OpenApiDocument {
  const result = OpenApiDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new OpenApiError(
      ErrorCodes.OPENAPI_MISSING_PATHS,
      `${source} is not an OpenAPI document with a paths object: ${formatZodError(result.error)}`,
      { source, errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Path template strings declared by a document, extensions excluded.
 */
export function extractPathTemplates(document: OpenApiDocument): string[] {
  return Object.keys(document.paths).filter((key) => !key.startsWith(EXTENSION_PREFIX));
}

/**
 * Build a path set from a parsed document.
 * @throws MalformedTemplateError if any template cannot be compiled
 */
export function pathSetFromDocument(data: unknown, source?: string): PathSet {
  return PathSet.fromTemplates(extractPathTemplates(parseOpenApiDocument(data, source)));
}

/**
 * Read an OpenAPI document (YAML or JSON) and build its path set.
 */
export async function loadOpenApiPaths(filePath: string): Promise<PathSet> {
  let data: unknown;
  try {
    data = await loadYaml(filePath);
  } catch (error) {
    if (error instanceof SystemError && error.code === ErrorCodes.PARSE_ERROR) {
      throw new OpenApiError(ErrorCodes.OPENAPI_PARSE_ERROR, `Could not parse ${filePath}: ${error.message}`, {
        filePath,
      });
    }
    throw new OpenApiError(ErrorCodes.OPENAPI_READ_ERROR, `Could not open ${filePath}`, {
      filePath,
      originalError: error instanceof Error ? error.message : String(error),
    });
  }
  return pathSetFromDocument(data, filePath);
}
