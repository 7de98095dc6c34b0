import path from 'node:path';
import { Command } from 'commander';
import { generate, unasyncFiles } from '@esforge/codegen';
import { createLogger } from '@esforge/shared';
import type { GlobalOptions } from '../lib/client';
import { formatOutput } from '../lib/output';

type GenerateCommandOptions = {
  spec: string[];
  out: string;
  sync?: string;
  templates?: string;
};

export function registerCodegenCommands(program: Command): void {
  program
    .command('generate')
    .description('Generate namespaced API modules from REST spec files')
    .requiredOption('--spec <dir...>', 'Directories of endpoint definitions; later ones override earlier ones')
    .requiredOption('--out <dir>', 'Directory that receives the generated modules')
    .option('--sync <dir>', 'Also write synchronous modules to this directory')
    .option('--templates <dir>', 'Use templates from this directory')
    .action(async (cmdOptions: GenerateCommandOptions) => {
      const options = program.opts<GlobalOptions>();
      const logger = createLogger({ name: 'esforge-codegen', level: options.logLevel });
      const result = await generate({
        specDirs: cmdOptions.spec.map((dir) => path.resolve(dir)),
        outDir: path.resolve(cmdOptions.out),
        sync: cmdOptions.sync ? path.resolve(cmdOptions.sync) : undefined,
        templatesDir: cmdOptions.templates ? path.resolve(cmdOptions.templates) : undefined,
        logger
      });
      if (options.json) {
        formatOutput(result, true);
        return;
      }
      console.log(`Generated ${result.namespaces.length} namespaces into ${path.resolve(cmdOptions.out)}`);
      if (result.syncFiles.length > 0) {
        console.log(`Wrote ${result.syncFiles.length} synchronous files`);
      }
    });

  program
    .command('unasync')
    .description('Rewrite asynchronous modules into synchronous ones')
    .argument('<from>', 'Directory of asynchronous .ts files')
    .argument('<to>', 'Output directory')
    .action(async (from: string, to: string) => {
      const options = program.opts<GlobalOptions>();
      const written = await unasyncFiles(path.resolve(from), path.resolve(to));
      if (options.json) {
        formatOutput({ files: written }, true);
        return;
      }
      console.log(`Wrote ${written.length} files to ${path.resolve(to)}`);
    });
}
