import { Command } from 'commander';
import { toTransportOptions } from '@esforge/client';
import type { CliClient, ClientFactory, GlobalOptions } from '../lib/client';
import { formatOutput, parseJsonBody, parseQueryPairs } from '../lib/output';

async function withClient<T>(
  clientFactory: ClientFactory,
  options: GlobalOptions,
  run: (client: CliClient) => Promise<T>
): Promise<T> {
  const client = clientFactory(options);
  try {
    return await run(client);
  } finally {
    await client.close();
  }
}

export function registerClusterCommands(program: Command, clientFactory: ClientFactory): void {
  program
    .command('info')
    .description('Show basic information about the cluster')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const info = await withClient(clientFactory, options, (client) => client.info());
      if (options.json) {
        formatOutput(info, true);
        return;
      }
      console.log(`${info.name} (cluster ${info.cluster_name}) running version ${info.version.number}`);
    });

  program
    .command('ping')
    .description('Check whether the cluster answers')
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const reachable = await withClient(clientFactory, options, (client) => client.ping());
      if (options.json) {
        formatOutput({ reachable }, true);
      } else {
        console.log(reachable ? 'Cluster is reachable' : 'Cluster is unreachable');
      }
      if (!reachable) {
        process.exitCode = 1;
      }
    });

  program
    .command('request')
    .description('Send a raw request through the transport')
    .argument('<method>', 'HTTP method')
    .argument('<path>', 'Request path, starting with /')
    .option('--query <pair...>', 'Query parameters as key=value (repeatable)')
    .option('--body <json>', 'JSON request body')
    .action(async (method: string, requestPath: string, cmdOptions: { query?: string[]; body?: string }) => {
      const options = program.opts<GlobalOptions>();
      const query = parseQueryPairs(cmdOptions.query ?? []);
      const body = parseJsonBody(cmdOptions.body);
      const response = await withClient(clientFactory, options, (client) =>
        client.transport.performRequest(method.toUpperCase(), requestPath, toTransportOptions(query, body))
      );
      formatOutput(response, options.json);
    });
}
