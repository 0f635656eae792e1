/**
 * Runtime configuration, read once from the environment
 */

export interface H2PingConfig {
  /** Emit debug logs (H2PING_DEBUG=1) */
  debug: boolean;
}

export const config: H2PingConfig = {
  debug: process.env.H2PING_DEBUG === '1',
};
