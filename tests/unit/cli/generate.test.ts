/**
 * Tests for the generate command.
 */
import { describe, it, expect, vi, beforeAll, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { createCli } from '../../../src/cli/index.js';
import { logger } from '../../../src/utils/logger.js';

const IDL = `
origin: shapes.idl
declarations:
  - name: point
    kind: record
    fields:
      - { name: x, type: i32 }
`;

describe('generate command', () => {
  let dir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridgegen-cli-'));
    fs.writeFileSync(path.join(dir, 'shapes.yaml'), IDL);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    logger.setLevel('info');
    process.exitCode = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(dir, 'bridgegen.yaml');
    fs.writeFileSync(file, content);
    return file;
  }

  async function run(...args: string[]): Promise<void> {
    await createCli().parseAsync(['node', 'bridgegen', 'generate', '--idl', path.join(dir, 'shapes.yaml'), ...args]);
  }

  it('writes every configured target and lists the outputs', async () => {
    const config = writeConfig('yaml:\n  out_folder: gen/yaml\n');
    const list = path.join(dir, 'out', 'files.txt');

    await run('-c', config, '--list-out-files', list);

    const yamlFile = path.join(dir, 'gen', 'yaml', 'point.yaml');
    expect(fs.readFileSync(yamlFile, 'utf-8').split('\n').slice(0, 3)).toEqual([
      '# AUTOGENERATED FILE - DO NOT MODIFY!',
      '# This file was generated by bridgegen from shapes.idl',
      '---',
    ]);
    expect(fs.readFileSync(list, 'utf-8')).toBe(`${yamlFile}\n`);
    expect(logSpy).toHaveBeenCalledWith('✓ Generated code for 1 declaration(s)');
    expect(process.exitCode).toBeUndefined();
  });

  it('lists outputs without writing them when skipping generation', async () => {
    const config = writeConfig('yaml:\n  out_folder: gen/yaml\n');
    const list = path.join(dir, 'files.txt');

    await run('-c', config, '--skip-generation', '--list-out-files', list);

    expect(fs.existsSync(path.join(dir, 'gen', 'yaml', 'point.yaml'))).toBe(false);
    expect(fs.readFileSync(list, 'utf-8')).toBe(`${path.join(dir, 'gen', 'yaml', 'point.yaml')}\n`);
    expect(logSpy).toHaveBeenCalledWith('✓ Checked 1 declaration(s); no files written');
  });

  it('names the IDL file in the bridging header when the config does not', async () => {
    const config = writeConfig('objc:\n  out_folder: gen/objc\n  swift_bridging_header_name: Shapes\n');

    await run('-c', config);

    const header = fs.readFileSync(path.join(dir, 'gen', 'objc', 'Shapes.h'), 'utf-8');
    expect(header.split('\n')[1]).toBe('// This file was generated by bridgegen from shapes.yaml');
    expect(header.endsWith('#import "Point.h"\n')).toBe(true);
  });

  it('reports a generation failure and sets the exit code', async () => {
    const config = writeConfig('java:\n  out_folder: gen/java\n');

    await run('-c', config);

    expect(logSpy).toHaveBeenCalledWith('✗ No Java generator is available, but its output folder is configured.');
    expect(process.exitCode).toBe(1);
  });

  it('reports a missing config file', async () => {
    await run('-c', path.join(dir, 'missing.yaml'));

    expect(errorSpy).toHaveBeenCalledWith('[ERROR] Generation failed');
    expect(process.exitCode).toBe(1);
  });

  it('logs each backend when verbose', async () => {
    const config = writeConfig('yaml:\n  out_folder: gen/yaml\n');

    await run('-c', config, '--verbose');

    expect(logSpy).toHaveBeenCalledWith('[DEBUG] Generating YAML...');
  });
});
