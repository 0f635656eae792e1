/**
 * Decode command - Parse a complete PING frame given as hex
 */

import { Command } from 'commander';
import { decodePingFrame } from 'h2ping';
import { describePing, parseHex } from '../format.js';
import { runAction } from '../run.js';

export const decodeCommand = new Command('decode')
  .description('Decode a PING frame (header and payload)')
  .argument('<hex>', 'Frame bytes as hex; whitespace between bytes is allowed', parseHex)
  .action((bytes: Uint8Array) =>
    runAction(() => {
      const ping = decodePingFrame(bytes);
      for (const line of describePing(ping)) {
        console.log(line);
      }
    })
  );
