/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { z } from 'zod';
import {
  parseYaml,
  parseYamlWithSchema,
  loadYaml,
  loadYamlWithSchema,
  formatZodError,
} from '../../../src/utils/yaml.js';
import { SystemError } from '../../../src/utils/errors.js';

const schema = z.object({ name: z.string(), count: z.number().default(1) });

describe('parseYaml', () => {
  it('should parse YAML and JSON', () => {
    expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
    expect(parseYaml('{"a": 1}')).toEqual({ a: 1 });
  });

  it('should raise a parse error on invalid content', () => {
    try {
      parseYaml('a: [1, 2');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe('S001');
      }
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply the schema', () => {
    expect(parseYamlWithSchema('name: x\n', schema)).toEqual({ name: 'x', count: 1 });
  });

  it('should report validation failures with paths', () => {
    expect(() => parseYamlWithSchema('name: 3\n', schema)).toThrow(/^YAML validation failed: name: /);
  });
});

describe('formatZodError', () => {
  it('should join issues', () => {
    const result = z.object({ a: z.string(), b: z.string() }).safeParse({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe('a: Required; b: Required');
    }
  });
});

describe('YAML files', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `redfish-yaml-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should load a file', async () => {
    const file = join(testDir, 'a.yaml');
    await writeFile(file, 'name: x\n');

    expect(await loadYaml(file)).toEqual({ name: 'x' });
  });

  it('should report a missing file', async () => {
    await expect(loadYaml(join(testDir, 'missing.yaml'))).rejects.toMatchObject({ code: 'S002' });
  });

  it('should add the file to schema errors', async () => {
    const file = join(testDir, 'b.yaml');
    await writeFile(file, 'count: 2\n');

    await expect(loadYamlWithSchema(file, schema)).rejects.toThrow(`(file: ${file})`);
  });
});
