/**
 * Tests for the CLI program.
 */
import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { createCli } from '../../../src/cli/index.js';
import { getToolVersion } from '../../../src/cli/version.js';

describe('createCli', () => {
  it('should register the validate command', () => {
    const program = createCli();

    expect(program.name()).toBe('redfish-uri-check');
    expect(program.commands.map((c) => c.name())).toEqual(['validate']);
  });

  it('should report the package version', () => {
    const pkg = JSON.parse(readFileSync(new URL('../../../package.json', import.meta.url), 'utf-8'));

    expect(getToolVersion()).toBe(pkg.version);
    expect(createCli().version()).toBe(pkg.version);
  });
});
