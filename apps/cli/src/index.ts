#!/usr/bin/env node

import { Command } from 'commander';
import { registerClusterCommands } from './commands/cluster';
import { registerCodegenCommands } from './commands/codegen';
import { createClient, type ClientFactory } from './lib/client';

export type CliDependencies = {
  clientFactory?: ClientFactory;
};

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('esforge')
    .description('Elasticsearch client tooling')
    .version('0.1.0')
    .option('--node <url>', 'Cluster URL (defaults to ESFORGE_NODES)')
    .option('--api-key <key>', 'API key (defaults to ESFORGE_API_KEY)')
    .option('--json', 'Output raw JSON')
    .option('--log-level <level>', 'pino log level (defaults to ESFORGE_LOG_LEVEL or warn)');

  registerCodegenCommands(program);
  registerClusterCommands(program, deps.clientFactory ?? createClient);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
