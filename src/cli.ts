#!/usr/bin/env node

// ============================================================================
// sd-connector CLI
// ============================================================================
// Runs one query and prints the result as JSON.
//
//   sd-connector department --institution-identifier AB
//   sd-connector person --institution-identifier AB --cpr 0101010000
//
// Credentials come from --username/--password, SD_USERNAME/SD_PASSWORD, or the
// config file (see connectorConfig.ts).
// ============================================================================

import { AsyncSDConnector } from './client/async-sd-connector.js';
import { log } from './config.js';
import {
  getConfigPath,
  loadConnectorConfig,
  mergeCliOverrides,
  resolveCredentials,
  toConnectorOptions,
} from './connectorConfig.js';
import { CliUsageError, parseCliArgs } from './cli/args.js';
import { prepareQuery } from './cli/run.js';

async function main(argv: string[]): Promise<void> {
  const args = parseCliArgs(argv);
  const run = prepareQuery(args);
  const configPath = args.configPath ?? getConfigPath();
  const config = mergeCliOverrides(loadConnectorConfig(configPath), {
    username: args.username,
    password: args.password,
    wsdlPrefix: args.wsdlPrefix,
    timeoutMs: args.timeoutMs,
  });

  const credentials = resolveCredentials(config);
  if (!credentials) {
    throw new CliUsageError(`No credentials. Pass --username/--password, set SD_USERNAME/SD_PASSWORD, or add them to ${configPath}`);
  }

  log(`cli: ${args.query} against ${config.connection.wsdl_prefix}`);
  const connector = await AsyncSDConnector.create(credentials, toConnectorOptions(config));
  try {
    const result = await run(connector);
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await connector.close();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(err instanceof CliUsageError ? `Usage: ${message}` : `Error: ${message}`);
  process.exit(err instanceof CliUsageError ? 2 : 1);
});
