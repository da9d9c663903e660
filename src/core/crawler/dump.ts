/**
 * Saved crawls: a JSON array of payloads in retrieval order.
 * Lets a validation be repeated without contacting the service.
 */
import { readFile, writeFile } from '../../utils/file-system.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { createResourceCollection, isJsonObject, isJsonValue } from '../resource/model.js';
import type { JsonObject, Resource } from '../resource/types.js';

/**
 * Parse a saved crawl.
 */
export function parseResourceDump(content: string, source = '<memory>'): Resource[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.INVALID_DUMP,
      `Failed to parse ${source}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { source }
    );
  }

  if (!Array.isArray(data)) {
    throw new SystemError(ErrorCodes.INVALID_DUMP, `${source} must contain a JSON array of resources`, { source });
  }

  const payloads: JsonObject[] = [];
  data.forEach((item: unknown, index) => {
    if (!isJsonObject(item) || !isJsonValue(item)) {
      throw new SystemError(ErrorCodes.INVALID_DUMP, `${source}: entry ${index} is not a JSON object`, {
        source,
        index,
      });
    }
    payloads.push(item);
  });

  return createResourceCollection(payloads);
}

/**
 * Load a saved crawl from a file.
 */
export async function loadResourceDump(filePath: string): Promise<Resource[]> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Could not open ${filePath}`, {
      filePath,
      originalError: error instanceof Error ? error.message : String(error),
    });
  }
  return parseResourceDump(content, filePath);
}

/**
 * Save a crawl to a file.
 */
export async function saveResourceDump(filePath: string, resources: readonly Resource[]): Promise<void> {
  await writeFile(filePath, JSON.stringify(resources.map((r) => r.payload), null, 2) + '\n');
}
