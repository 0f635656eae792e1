#!/usr/bin/env node
/**
 * h2ping CLI
 */

import { Command } from 'commander';
import { logger } from 'h2ping';
import { encodeCommand } from './commands/encode.js';
import { decodeCommand } from './commands/decode.js';
import { classifyCommand } from './commands/classify.js';

const program = new Command();

program
  .name('h2ping')
  .description('Encode, decode and classify HTTP/2 PING frames')
  .version('0.1.0')
  .option('-v, --verbose', 'Print debug logs', false)
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose: boolean }>().verbose) {
      logger.setDebug(true);
    }
  });

program.addCommand(encodeCommand);
program.addCommand(decodeCommand);
program.addCommand(classifyCommand);

program.parse();
