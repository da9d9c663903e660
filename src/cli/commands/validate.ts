/**
 * The validate command: crawl a service (or load a saved crawl), check every
 * resource URI against an OpenAPI document, print a summary and write reports.
 */
import { Command, InvalidArgumentError, Option } from 'commander';
import { loadConfig, toValidationRunOptions } from '../../core/config/loader.js';
import { ReportFormatSchema, type Config, type ReportFormat } from '../../core/config/schema.js';
import { loadOpenApiPaths } from '../../core/openapi/loader.js';
import { RedfishClient } from '../../core/crawler/client.js';
import { RedfishCrawler } from '../../core/crawler/crawler.js';
import { loadResourceDump, saveResourceDump } from '../../core/crawler/dump.js';
import type { Resource } from '../../core/resource/types.js';
import { runValidation } from '../../core/validation/run.js';
import { writeReports } from '../../core/report/writer.js';
import type { ReportContext } from '../../core/report/types.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { HumanFormatter, JsonFormatter, type IFormatter, type OutputFormat } from '../formatters/index.js';
import { getToolVersion } from '../version.js';

export interface ValidateOptions {
  openapi: string;
  user?: string;
  password?: string;
  rhost?: string;
  logdir?: string;
  resources?: string;
  saveResources?: string;
  format: OutputFormat;
  report?: ReportFormat[];
  showAll?: boolean;
  showSkipped?: boolean;
  strictMarkers?: boolean;
  failOnFail?: boolean;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Parse a comma-separated list of report formats; `none` disables reports.
 */
export function parseReportFormats(value: string): ReportFormat[] {
  const names = value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  if (names.length === 1 && names[0] === 'none') {
    return [];
  }
  return names.map((name) => {
    const parsed = ReportFormatSchema.safeParse(name);
    if (!parsed.success) {
      throw new InvalidArgumentError(`Unknown report format '${name}' (expected html, json or none).`);
    }
    return parsed.data;
  });
}

/**
 * Create the validate command.
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Walk a Redfish service and verify URIs against an OpenAPI specification')
    .requiredOption('-o, --openapi <file>', 'The OpenAPI specification to use for validation')
    .option('-r, --rhost <url>', 'The address of the Redfish service (with scheme)')
    .option('-u, --user <name>', 'The user name for authentication (default: $REDFISH_USER)')
    .option('-p, --password <password>', 'The password for authentication (default: $REDFISH_PASSWORD)')
    .option('-d, --logdir <dir>', 'Output directory for reports')
    .option('--resources <file>', 'Validate a saved crawl instead of contacting the service')
    .option('--save-resources <file>', 'Save the crawled resources to a file')
    .addOption(new Option('--format <format>', 'Terminal output format').choices(['human', 'json']).default('human'))
    .option('--report <formats>', 'Report files to write: html, json, or none (comma-separated)', parseReportFormats)
    .option('--show-all', 'Show passing URIs in terminal output')
    .option('--show-skipped', 'List resources skipped as expected exceptions')
    .option('--strict-markers', 'Only honour exception markers on the property directly holding the reference')
    .option('--fail-on-fail', 'Exit with code 1 when any resource fails')
    .option('--config <path>', 'Path to config file')
    .option('--quiet', 'Suppress progress output')
    .option('--verbose', 'Show debug output')
    .action(async (options: ValidateOptions) => {
      let exitCode: number;
      try {
        exitCode = await runValidate(options);
      } catch (error) {
        logger.error(
          error instanceof Error ? error.message : 'Validation failed',
          options.verbose && error instanceof Error ? error : undefined
        );
        exitCode = 1;
      }
      process.exit(exitCode);
    });
}

/**
 * Run a validation end to end.
 * @returns Process exit code
 */
export async function runValidate(options: ValidateOptions): Promise<number> {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet || options.format === 'json') {
    logger.setLevel('warn');
  }
  // stdout carries the JSON document
  if (options.format === 'json') {
    logger.setStream('stderr');
  }

  const config = await loadConfig(process.cwd(), options.config);
  if (options.strictMarkers) {
    config.validation.strict_markers = true;
  }

  logger.info(`Opening ${options.openapi}...`);
  const pathSet = await loadOpenApiPaths(options.openapi);
  logger.debug(`Loaded ${pathSet.size} path templates`);

  const user = options.user ?? process.env.REDFISH_USER;
  const resources = options.resources
    ? await loadSavedCrawl(options.resources)
    : await crawlService(options, config, user);

  if (options.saveResources) {
    await saveResourceDump(options.saveResources, resources);
    logger.info(`Saved ${resources.length} resources to ${options.saveResources}`);
  }

  logger.info('Generating results...');
  const result = runValidation(resources, pathSet, toValidationRunOptions(config));

  console.log(createFormatter(options).formatResult(result));

  const formats = options.report ?? config.report.formats;
  if (formats.length > 0) {
    const context: ReportContext = {
      title: config.report.title,
      toolVersion: getToolVersion(),
      logo: config.report.logo,
      system: options.resources ?? `${options.rhost ?? ''}${config.service.root}`,
      user: options.resources ? undefined : user,
      openapi: options.openapi,
      timestamp: new Date(),
    };
    const written = await writeReports(result, context, {
      formats,
      logdir: options.logdir ?? config.report.logdir,
    });
    for (const filePath of written) {
      logger.success(`Report written to ${filePath}`);
    }
  }

  return options.failOnFail && result.totalFail > 0 ? 1 : 0;
}

async function loadSavedCrawl(filePath: string): Promise<Resource[]> {
  logger.info(`Loading resources from ${filePath}...`);
  return loadResourceDump(filePath);
}

async function crawlService(options: ValidateOptions, config: Config, user: string | undefined): Promise<Resource[]> {
  const password = options.password ?? process.env.REDFISH_PASSWORD;
  if (!options.rhost || user === undefined || password === undefined) {
    throw new ConfigError(
      ErrorCodes.CONFIG_MISSING_OPTION,
      '--rhost, --user and --password are required unless --resources is given'
    );
  }

  logger.info(`Service URI: ${options.rhost}`);
  logger.info('Logging in and downloading resources; this may take a while...');

  const client = new RedfishClient({
    baseUrl: options.rhost,
    username: user,
    password,
    auth: config.service.auth,
    timeoutMs: config.service.timeout_ms,
    serviceRoot: config.service.root,
  });
  const crawler = new RedfishCrawler(client, {
    serviceRoot: config.service.root,
    maxResources: config.service.max_resources,
  });
  const resources = await crawler.crawl();
  logger.info(`Retrieved ${resources.length} resources`);
  return resources;
}

function createFormatter(options: ValidateOptions): IFormatter {
  switch (options.format) {
    case 'json':
      return new JsonFormatter({ showSkipped: options.showSkipped });
    default:
      return new HumanFormatter({
        colors: !options.quiet,
        showPassing: !!options.showAll,
        showSkipped: !!options.showSkipped,
      });
  }
}
