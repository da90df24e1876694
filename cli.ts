#!/usr/bin/env node
import readline from 'readline';
import { Info } from 'luxon';
import config from './config/env';
import { ReplSession } from './services/cli/replSession';
import { formatErrorForLogging } from './utils/errorHandler';
import logger from './utils/logger';

function main(): void {
  const zone = config.cli.zone;
  if (zone !== undefined && !Info.isValidIANAZone(zone)) {
    logger.error(`❌ HUMAN_TIME_ZONE is not a valid IANA zone: ${zone}`);
    process.exitCode = 1;
    return;
  }

  const session = new ReplSession({ zone });
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });

  rl.setPrompt('> ');
  rl.prompt();

  rl.on('line', (line) => {
    try {
      for (const output of session.handleLine(line)) {
        process.stdout.write(`${output}\n`);
      }
    } catch (error) {
      logger.error('❌ Unexpected failure', formatErrorForLogging(error));
      process.exitCode = 1;
    }
    rl.prompt();
  });

  rl.on('close', () => {
    process.stdout.write('\n');
  });
}

main();
