/**
 * generate command - Run every configured backend over an IDL document.
 */

import { Command } from 'commander';
import { basename, resolve } from 'path';
import { loadConfig, applyOverrides } from '../../core/config/loader.js';
import { loadDeclarations } from '../../core/ast/loader.js';
import { generate } from '../../core/orchestrator/orchestrator.js';
import { logger } from '../../utils/logger.js';

interface GenerateCommandOptions {
  idl: string;
  config?: string;
  skipGeneration?: boolean;
  listOutFiles?: string;
  verbose?: boolean;
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate bridge code for the declarations in an IDL document')
    .requiredOption('--idl <file>', 'Declaration document (YAML)')
    .option('-c, --config <file>', 'Path to config file (default: bridgegen.yaml)')
    .option('--skip-generation', 'List output paths without writing any file')
    .option('--list-out-files <file>', 'Write every output path to <file>, one per line')
    .option('--verbose', 'Log each backend and created folder')
    .action(async (options: GenerateCommandOptions) => {
      if (options.verbose) {
        logger.setLevel('debug');
      }

      try {
        const projectRoot = process.cwd();
        const loaded = await loadConfig(projectRoot, options.config);
        const config = applyOverrides(loaded, {
          idlFileName: loaded.idlFileName === '' ? basename(options.idl) : undefined,
          skipGeneration: options.skipGeneration,
          outFileList: options.listOutFiles === undefined ? undefined : resolve(projectRoot, options.listOutFiles),
        });
        const idl = await loadDeclarations(resolve(projectRoot, options.idl));

        const failure = generate(idl, config);
        if (failure !== undefined) {
          logger.fail(failure);
          process.exitCode = 1;
          return;
        }

        const local = idl.filter((decl) => decl.scope === 'intern').length;
        logger.success(
          config.skipGeneration
            ? `Checked ${local} declaration(s); no files written`
            : `Generated code for ${local} declaration(s)`
        );
      } catch (error) {
        logger.error('Generation failed', error instanceof Error ? error : undefined);
        process.exitCode = 1;
      }
    });
}
