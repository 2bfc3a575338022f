#!/usr/bin/env node

/**
 * Mnemo CLI — Inspect and Maintain the Memory Store
 *
 * Usage:
 *   mnemo status                          Store summary
 *   mnemo show [--full] [--circle <id>]   Dump recent memories
 *   mnemo circles                         List circles with node counts
 *   mnemo purge --circle <id> | --all     Delete memories
 *   mnemo sweep [--ttl <seconds>]         Evict expired memories now
 */

import { status } from './commands/status.js';
import { show } from './commands/show.js';
import { circles } from './commands/circles.js';
import { purge } from './commands/purge.js';
import { sweep } from './commands/sweep.js';
import { flagNumber, flagString, parseArgs } from './utils.js';
import { errorMessage } from '@mnemo/shared';

const USAGE = `
Mnemo — Local Semantic Memory

Usage:
  mnemo status                          Show store summary
  mnemo show [--full] [--circle <id>] [--limit <n>]
                                        Dump recent memories, newest first
  mnemo circles                         List circles with node counts
  mnemo purge --circle <id>             Delete every memory in a circle
  mnemo purge --all                     Delete every memory
  mnemo sweep [--ttl <seconds>]         Evict expired memories now
  mnemo help                            Show this help message

Environment:
  MNEMO_HOME       Config and data directory (default ~/.mnemo)
  MNEMO_DB_PATH    Database file (default $MNEMO_HOME/mnemo.db)
  MNEMO_DEBUG=1    Verbose logging

Version: 0.1.0
`;

async function main(): Promise<void> {
  const { command, flags } = parseArgs(process.argv.slice(2));

  switch (command) {
    case 'status': {
      console.log(status().report);
      break;
    }

    case 'show': {
      const result = show({
        full: flags.full === true,
        circleId: flagString(flags, 'circle'),
        limit: flagNumber(flags, 'limit'),
      });
      console.log(result.report);
      break;
    }

    case 'circles': {
      console.log(circles().report);
      break;
    }

    case 'purge': {
      const result = await purge({ circleId: flagString(flags, 'circle'), all: flags.all === true });
      console.log(result.report);
      if (!result.ok) process.exit(1);
      break;
    }

    case 'sweep': {
      const result = await sweep({ ttlSeconds: flagNumber(flags, 'ttl') });
      console.log(result.report);
      if (!result.ok) process.exit(1);
      break;
    }

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      console.log(USAGE);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log(USAGE);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Mnemo error:', errorMessage(err));
  process.exit(1);
});
