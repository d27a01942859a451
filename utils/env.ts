/**
 * Get the environment variable name holding the RPC URL of a network
 *
 * @param network - The network name (eg. `avalanche_mainnet`)
 * @returns The variable name (eg. `RPC_URL_AVALANCHE_MAINNET`)
 */
export function getRpcUrlEnvName(network: string): string {
  return `RPC_URL_${network.toUpperCase()}`;
}

/**
 * Get the RPC URL of a network from the environment
 *
 * @param network - The network name
 * @param env - The environment to read, defaults to process.env
 * @returns The RPC URL
 */
export function getRpcUrl(
  network: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const name = getRpcUrlEnvName(network);
  const url = env[name];

  if (!url) {
    throw new Error(`Missing ${name} in the environment (see .env.example)`);
  }

  if (!/^(https?|wss?):\/\//.test(url)) {
    throw new Error(`${name} is not an http(s) or ws(s) URL: ${url}`);
  }
  return url;
}
