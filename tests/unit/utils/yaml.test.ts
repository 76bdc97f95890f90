/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import {
  formatZodError,
  loadYamlWithSchema,
  parseYaml,
  parseYamlWithSchema,
  stringifyYaml,
} from '../../../src/utils/yaml.js';
import { ErrorCodes, SystemError } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  count: z.number().optional(),
});

describe('parseYaml', () => {
  it('parses mappings', () => {
    expect(parseYaml('name: Foo\ncount: 2\n')).toEqual({ name: 'Foo', count: 2 });
  });

  it('returns null for an empty document', () => {
    expect(parseYaml('')).toBeNull();
  });

  it('wraps syntax errors in a SystemError', () => {
    try {
      parseYaml('key: [unclosed');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.PARSE_ERROR);
        expect(error.message.startsWith('Failed to parse YAML: ')).toBe(true);
      }
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('returns validated data', () => {
    expect(parseYamlWithSchema('name: Foo\n', Schema)).toEqual({ name: 'Foo' });
  });

  it('validates an empty document as an empty object', () => {
    expect(parseYamlWithSchema('', z.object({}))).toEqual({});
  });

  it('reports validation issues with their paths', () => {
    expect(() => parseYamlWithSchema('count: 2\n', Schema)).toThrow(/^YAML validation failed: name: /);
  });
});

describe('loadYamlWithSchema', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridgegen-yaml-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads and validates a file', async () => {
    const file = path.join(dir, 'ok.yaml');
    fs.writeFileSync(file, 'name: Bar\ncount: 3\n');
    await expect(loadYamlWithSchema(file, Schema)).resolves.toEqual({ name: 'Bar', count: 3 });
  });

  it('names the file when validation fails', async () => {
    const file = path.join(dir, 'bad.yaml');
    fs.writeFileSync(file, 'count: nope\n');
    await expect(loadYamlWithSchema(file, Schema)).rejects.toThrow(`(file: ${file})`);
  });

  it('fails to load a missing file', async () => {
    const file = path.join(dir, 'missing.yaml');
    await expect(loadYamlWithSchema(file, Schema)).rejects.toThrow(`Failed to load YAML file: ${file}`);
  });
});

describe('stringifyYaml', () => {
  it('writes block style with two-space indent', () => {
    expect(stringifyYaml({ name: 'Foo', cpp: { typename: '::ns::Foo' } })).toBe(
      'name: Foo\ncpp:\n  typename: ::ns::Foo\n'
    );
  });

  it('writes empty lists inline', () => {
    expect(stringifyYaml({ params: [] })).toBe('params: []\n');
  });
});

describe('formatZodError', () => {
  it('joins issues with their paths', () => {
    const result = Schema.safeParse({ name: 1, count: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      const message = formatZodError(result.error);
      expect(message.split('; ').map((part) => part.split(':')[0])).toEqual(['name', 'count']);
    }
  });

  it('omits an empty path', () => {
    const result = z.string().safeParse(1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe(result.error.issues[0]?.message);
    }
  });
});
