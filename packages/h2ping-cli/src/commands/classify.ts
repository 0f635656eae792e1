import { Command } from 'commander';
import { classifyPayload, payloadFromBytes } from 'h2ping';
import { formatClass, parseHex } from '../format.js';
import { runAction } from '../run.js';

export const classifyCommand = new Command('classify')
  .description('Classify an 8-byte PING payload as shutdown, user:<id> or ordinary')
  .argument('<hex>', 'Payload bytes as hex', parseHex)
  .action((bytes: Uint8Array) =>
    runAction(() => {
      console.log(formatClass(classifyPayload(payloadFromBytes(bytes))));
    })
  );
