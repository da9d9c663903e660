import { Command } from 'commander';
import { createValidateCommand } from './commands/validate.js';
import { getToolVersion } from './version.js';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('redfish-uri-check')
    .description('Walk a Redfish service and verify resource URIs against an OpenAPI specification')
    .version(getToolVersion());
  [createValidateCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
