/**
 * Solana chain access: balances, aggregator swaps and bridge deposits
 */

import {
  Connection,
  PublicKey,
  SystemProgram,
  Transaction,
  VersionedTransaction,
} from '@solana/web3.js';
import { AxiosInstance } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { createHttpClient } from './http';
import { BridgeRequest, ChainGateway, SignerAccess, SubmitOptions, SwapRequest, SwapResult } from './types';

const log = createLogger('chain');

export const NATIVE_MINT = 'So11111111111111111111111111111111111111112';

const QuoteSchema = z
  .object({
    outAmount: z.string(),
    routePlan: z.array(z.unknown()).min(1, 'no route found'),
  })
  .passthrough();

const SwapResponseSchema = z.object({
  swapTransaction: z.string(),
  lastValidBlockHeight: z.number(),
});

export interface SolanaChainGatewayOptions {
  rpcUrl: string;
  swapApiUrl: string;
  proxy: string | null;
  timeoutMs?: number;
}

export class SolanaChainGateway implements ChainGateway {
  private readonly connection: Connection;
  private readonly swapApi: AxiosInstance;

  constructor(options: SolanaChainGatewayOptions) {
    this.connection = new Connection(options.rpcUrl, {
      commitment: 'confirmed',
      httpAgent: options.proxy ? new HttpsProxyAgent(options.proxy) : undefined,
    });
    this.swapApi = createHttpClient({
      baseURL: options.swapApiUrl,
      proxy: options.proxy,
      timeoutMs: options.timeoutMs,
    });
  }

  async getBalance(address: string): Promise<number> {
    return this.connection.getBalance(new PublicKey(address));
  }

  /**
   * Quote, build, sign and send. Nothing is sent once options.signal has
   * aborted; options.onSubmitted hears the signature before confirmation.
   */
  async swap(signer: SignerAccess, request: SwapRequest, options: SubmitOptions = {}): Promise<SwapResult> {
    const { signal } = options;
    const quoteResponse = await this.swapApi.get('/quote', {
      params: {
        inputMint: request.inputMint,
        outputMint: request.outputMint,
        amount: request.amountLamports,
        slippageBps: request.slippageBps,
      },
      signal,
    });
    const quote = QuoteSchema.parse(quoteResponse.data);

    return signer.withSigner(async (keypair) => {
      const swapResponse = await this.swapApi.post(
        '/swap',
        {
          quoteResponse: quote,
          userPublicKey: keypair.publicKey.toBase58(),
          wrapAndUnwrapSol: true,
          dynamicComputeUnitLimit: true,
        },
        { signal }
      );
      const { swapTransaction, lastValidBlockHeight } = SwapResponseSchema.parse(swapResponse.data);

      const transaction = VersionedTransaction.deserialize(Buffer.from(swapTransaction, 'base64'));
      transaction.sign([keypair]);

      signal?.throwIfAborted();
      const signature = await this.connection.sendRawTransaction(transaction.serialize(), { maxRetries: 2 });
      options.onSubmitted?.(signature);

      const confirmation = await this.connection.confirmTransaction(
        { signature, blockhash: transaction.message.recentBlockhash, lastValidBlockHeight },
        'confirmed'
      );
      if (confirmation.value.err) {
        throw new Error(`Swap transaction failed: ${JSON.stringify(confirmation.value.err)}`);
      }

      log.debug('Swap confirmed', { signature });
      return { signature, outAmount: quote.outAmount };
    });
  }

  async bridgeDeposit(signer: SignerAccess, request: BridgeRequest, options: SubmitOptions = {}): Promise<string> {
    const depositAddress = new PublicKey(request.depositAddress);

    return signer.withSigner(async (keypair) => {
      const { blockhash, lastValidBlockHeight } = await this.connection.getLatestBlockhash('confirmed');
      const transaction = new Transaction({ feePayer: keypair.publicKey, blockhash, lastValidBlockHeight }).add(
        SystemProgram.transfer({
          fromPubkey: keypair.publicKey,
          toPubkey: depositAddress,
          lamports: request.amountLamports,
        })
      );
      transaction.sign(keypair);

      options.signal?.throwIfAborted();
      const signature = await this.connection.sendRawTransaction(transaction.serialize());
      options.onSubmitted?.(signature);

      const confirmation = await this.connection.confirmTransaction(
        { signature, blockhash, lastValidBlockHeight },
        'confirmed'
      );
      if (confirmation.value.err) {
        throw new Error(`Bridge deposit failed: ${JSON.stringify(confirmation.value.err)}`);
      }

      log.debug('Bridge deposit confirmed', { signature });
      return signature;
    });
  }
}
