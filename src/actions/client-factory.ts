/**
 * Production ClientFactory: portal over axios, chain over web3.js, both bound
 * to the wallet's proxy
 */

import { Env } from '../config';
import { SolanaChainGateway } from './chain-gateway';
import { HttpPortalApi } from './portal-api';
import { ChainGateway, ClientFactory, PortalApi } from './types';

export function createClientFactory(env: Env, timeoutMs: number): ClientFactory {
  return {
    portal: (address: string, proxy: string | null): PortalApi =>
      new HttpPortalApi({
        baseURL: env.PORTAL_API_URL,
        bridgeURL: env.BRIDGE_API_URL,
        address,
        proxy,
        timeoutMs,
      }),
    chain: (proxy: string | null): ChainGateway =>
      new SolanaChainGateway({ rpcUrl: env.RPC_URL, swapApiUrl: env.SWAP_API_URL, proxy, timeoutMs }),
  };
}
