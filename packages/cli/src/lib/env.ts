/**
 * Environment and connection flag resolution
 */

import type { ConfigOverrides } from "@taskbridge/sdk";

export type ConnectionFlags = {
  url?: string;
  db?: string;
  user?: string;
  password?: string;
};

/**
 * Connection flags as configuration overrides; flags beat the environment
 */
export function connectionOverrides(flags: ConnectionFlags): ConfigOverrides {
  return {
    url: flags.url,
    database: flags.db,
    username: flags.user,
    password: flags.password,
  };
}

/**
 * Verbose diagnostics: `--verbose` or TASKBRIDGE_CLI_DEBUG=1
 */
export function isVerbose(flag: boolean | undefined, env: NodeJS.ProcessEnv = process.env): boolean {
  return flag === true || env.TASKBRIDGE_CLI_DEBUG === "1";
}
