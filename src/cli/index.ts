/**
 * Command line interface
 */
import { cac } from 'cac';
import { isZonekeeperError, logger } from '../core/index.js';
import { ipAction, serveAction, syncAction, type SyncOptions } from './actions.js';

const VERSION = '1.0.0';

function print(text: string): void {
  process.stdout.write(text + '\n');
}

/**
 * Wrap an action so errors become a message and exit code 1
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      if (isZonekeeperError(error)) {
        process.stderr.write(`✗ ${error.message}\n`);
        logger.debug({ error }, 'Command failed');
      } else {
        logger.error({ error }, 'Command failed');
      }
      process.exitCode = 1;
    }
  };
}

export function createCli() {
  const cli = cac('zonekeeper');

  cli
    .command('sync <settings> <hosts>', 'Update zone TTL and records from a hosts file')
    .option('-u, --update', 'Write changes (default: report only)')
    .option('-t, --ttl <ttl>', 'Set the zone TTL in seconds (default: leave unchanged)')
    .option('-v, --verbose', 'Debugging output')
    .action(
      run(async (settings: string, hosts: string, options: SyncOptions) => {
        print(await syncAction(settings, hosts, options));
      })
    );

  cli
    .command('serve [settings]', 'Serve the dynamic DNS update webhook')
    .option('-v, --verbose', 'Debugging output')
    .action(
      run(async (settings: string | undefined, options: { verbose?: boolean }) => {
        const server = await serveAction(settings, options);
        const shutdown = () => {
          logger.info('Shutting down');
          server.close();
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      })
    );

  cli
    .command('ip [settings]', 'Print the external IP address')
    .action(
      run(async (settings: string | undefined) => {
        print(await ipAction(settings));
      })
    );

  cli.help();
  cli.version(VERSION);

  return cli;
}
