#!/usr/bin/env node
/**
 * zonekeeper - Entry Point
 *
 * Keeps DNS host records in sync with a hosts file or a dynamic IP
 */
import { createCli } from './cli/index.js';

async function main(): Promise<void> {
  const cli = createCli();
  const { options } = cli.parse(process.argv, { run: false });

  // cac has already printed help or the version
  if (options['help'] || options['version']) {
    return;
  }

  if (!cli.matchedCommand) {
    cli.outputHelp();
    process.exitCode = cli.args.length > 0 ? 1 : 0;
    return;
  }

  await cli.runMatchedCommand();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
