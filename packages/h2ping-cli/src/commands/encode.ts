/**
 * Encode command - Build a PING frame and print it as hex
 */

import { Command } from 'commander';
import { Ping, bytesToHex, encodePing } from 'h2ping';
import { type EncodeOptions, parseHex, parseUserId, resolvePayload } from '../format.js';
import { runAction } from '../run.js';

export const encodeCommand = new Command('encode')
  .description('Encode a PING frame (probe by default)')
  .option('-a, --ack', 'Encode a response (ACK flag set)', false)
  .option('-p, --payload <hex>', 'Payload as 8 bytes of hex', parseHex)
  .option('--shutdown', 'Use the graceful-shutdown payload')
  .option('-u, --user <id>', 'Use the user ping payload with this tag (0 or 1)', parseUserId)
  .option('-r, --random', 'Use a random keep-alive payload')
  .action((options: EncodeOptions) =>
    runAction(() => {
      const payload = resolvePayload(options);
      const ping = options.ack ? Ping.pong(payload) : Ping.probe(payload);
      console.log(bytesToHex(encodePing(ping)));
    })
  );
