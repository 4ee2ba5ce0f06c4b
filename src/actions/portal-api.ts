/**
 * Portal HTTP client
 *
 * Sign-in is a signed challenge: the portal hands out a message, the wallet
 * signs it with ed25519 and the portal returns a bearer token.
 * Every response is the envelope { data?, error? } and is validated with zod.
 */

import { AxiosAdapter, AxiosInstance } from 'axios';
import bs58 from 'bs58';
import nacl from 'tweetnacl';
import { z } from 'zod';
import { ActionFailure } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { createHttpClient } from './http';
import {
  AgentReceipt,
  PortalApi,
  PortalProfile,
  Quiz,
  QuizQuestion,
  RewardClaim,
  SignerAccess,
  SocialPlatform,
  SocialStatus,
  StakePosition,
} from './types';

const log = createLogger('portal');

const BadgeSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  eligible: z.boolean(),
  minted: z.boolean(),
});

const ProfileSchema = z.object({
  address: z.string(),
  points: z.number().default(0),
  invite_code: z.string().nullable().default(null),
  onboarding_quiz_completed: z.boolean(),
  daily_quiz_completed: z.boolean(),
  faucet_claimable: z.boolean(),
  badges: z.array(BadgeSchema).default([]),
});

const QuizSchema = z.object({
  quiz: z.object({ quiz_id: z.number().int().nullable().default(null) }),
  question: z.array(
    z.object({
      question_id: z.union([z.string(), z.number()]).transform(String),
      content: z.string(),
      answer: z.string(),
    })
  ),
});

const ChallengeSchema = z.object({ message: z.string() });
const TokenSchema = z.object({ access_token: z.string() });
const AnswerSchema = z.object({ result: z.string() });
const TxSchema = z.object({ tx_hash: z.string() });
const ReceiptSchema = z.object({ id: z.union([z.string(), z.number()]).transform(String) });

const SocialStatusSchema = z.object({
  twitter_bound: z.boolean(),
  discord_bound: z.boolean(),
  tasks: z
    .array(
      z.object({
        id: z.number().int(),
        platform: z.enum(['twitter', 'discord']),
        title: z.string(),
        is_completed: z.boolean(),
      })
    )
    .default([]),
});
const BalanceSchema = z.object({ balances: z.object({ token: z.number() }) });
const StakedSchema = z.object({
  subnets: z
    .array(z.object({ subnet_address: z.string(), my_staked_amount: z.number() }))
    .default([]),
});
const ClaimSchema = z.object({ tx_hash: z.string(), claim_amount: z.number() });

const EnvelopeSchema = z.object({ data: z.unknown().optional(), error: z.string().optional() });

function toProfile(raw: z.infer<typeof ProfileSchema>): PortalProfile {
  return {
    address: raw.address,
    points: raw.points,
    inviteCode: raw.invite_code,
    onboardingQuizCompleted: raw.onboarding_quiz_completed,
    dailyQuizCompleted: raw.daily_quiz_completed,
    faucetClaimable: raw.faucet_claimable,
    badges: raw.badges,
  };
}

function toQuiz(raw: z.infer<typeof QuizSchema>): Quiz {
  return {
    id: raw.quiz.quiz_id,
    questions: raw.question.map((q) => ({ id: q.question_id, content: q.content, answer: q.answer })),
  };
}

const StreamChunkSchema = z.object({
  choices: z.array(z.object({ delta: z.object({ content: z.string().optional() }) })),
});

/**
 * Concatenate the content deltas of an event-stream agent reply
 */
export function parseAgentStream(body: string): string {
  const parts: string[] = [];

  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line.startsWith('data:')) continue;
    const payload = line.slice('data:'.length).trim();
    if (payload === '[DONE]') break;

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      continue;
    }
    const chunk = StreamChunkSchema.safeParse(parsed);
    const content = chunk.success ? chunk.data.choices[0]?.delta.content : undefined;
    if (content) parts.push(content);
  }

  return parts.join('').trim();
}

export interface HttpPortalApiOptions {
  baseURL: string;
  /** Deposit notifications go here instead of the portal when set */
  bridgeURL?: string;
  address: string;
  proxy: string | null;
  timeoutMs?: number;
  /** Replaces the network transport (in-process servers in tests) */
  adapter?: AxiosAdapter;
}

export class HttpPortalApi implements PortalApi {
  private readonly http: AxiosInstance;
  private readonly address: string;
  private readonly bridgeURL: string | undefined;
  private token: string | null = null;

  constructor(options: HttpPortalApiOptions) {
    this.address = options.address;
    this.bridgeURL = options.bridgeURL;
    this.http = createHttpClient({
      baseURL: options.baseURL,
      proxy: options.proxy,
      timeoutMs: options.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
      adapter: options.adapter,
    });
  }

  async signIn(signer: SignerAccess): Promise<void> {
    const challenge = await this.get('/auth/challenge', ChallengeSchema, { address: this.address });
    const message = new TextEncoder().encode(challenge.message);

    const signature = await signer.withSigner(async (keypair) => {
      const secretKey = keypair.secretKey;
      try {
        return nacl.sign.detached(message, secretKey);
      } finally {
        secretKey.fill(0);
      }
    });

    const token = await this.post('/auth/signin', TokenSchema, {
      address: this.address,
      message: challenge.message,
      signature: bs58.encode(signature),
    });
    this.token = token.access_token;
    log.debug('Signed in', { address: this.address });
  }

  async getProfile(): Promise<PortalProfile | null> {
    const response = await this.http.get('/me', {
      headers: this.authHeaders(),
      validateStatus: (status) => status < 500 && status !== 429,
    });
    const parsed = EnvelopeSchema.safeParse(response.data);
    if (parsed.success && parsed.data.error?.includes('User does not exist')) {
      return null;
    }
    return toProfile(this.unwrap('/me', ProfileSchema, response.data));
  }

  async register(referralCode: string | null, signal?: AbortSignal): Promise<PortalProfile> {
    const profile = await this.post(
      '/auth/register',
      ProfileSchema,
      { address: this.address, referral_code: referralCode ?? '' },
      signal
    );
    return toProfile(profile);
  }

  async getOnboardingQuiz(signal?: AbortSignal): Promise<Quiz> {
    return toQuiz(await this.get('/quiz/onboard', QuizSchema, { address: this.address }, signal));
  }

  async getDailyQuiz(signal?: AbortSignal): Promise<Quiz> {
    const date = new Date().toISOString().slice(0, 10);
    return toQuiz(
      await this.post('/quiz/daily', QuizSchema, { title: `daily_quiz_${date}`, address: this.address }, signal)
    );
  }

  async submitAnswer(quiz: Quiz, question: QuizQuestion, finish: boolean, signal?: AbortSignal): Promise<boolean> {
    const result = await this.post(
      quiz.id === null ? '/quiz/onboard/submit' : '/quiz/submit',
      AnswerSchema,
      {
        address: this.address,
        quiz_id: quiz.id,
        question_id: question.id,
        answer: question.answer,
        finish,
      },
      signal
    );
    return result.result === 'RIGHT';
  }

  async claimFaucet(signal?: AbortSignal): Promise<string> {
    return (await this.post('/faucet/claim', TxSchema, {}, signal)).tx_hash;
  }

  async mintBadge(badgeId: number, signal?: AbortSignal): Promise<string> {
    return (await this.post('/badges/mint', TxSchema, { badge_id: badgeId }, signal)).tx_hash;
  }

  async askAgent(serviceId: string, question: string, signal?: AbortSignal): Promise<string> {
    const response = await this.http.post<string>(
      '/agent/inference',
      { service_id: serviceId, body: { message: question, stream: true }, stream: true },
      { headers: { ...this.authHeaders(), Accept: 'text/event-stream' }, responseType: 'text', signal }
    );
    const answer = parseAgentStream(response.data);
    if (!answer) {
      throw new ActionFailure('ai_dialog', 'Agent returned an empty answer');
    }
    return answer;
  }

  async submitReceipt(serviceId: string, question: string, answer: string, signal?: AbortSignal): Promise<AgentReceipt> {
    return this.post(
      '/agent/receipt',
      ReceiptSchema,
      {
        address: this.address,
        service_id: serviceId,
        input: [{ type: 'text/plain', value: question }],
        output: [{ type: 'text/plain', value: answer }],
      },
      signal
    );
  }

  async getInferenceTx(receiptId: string, signal?: AbortSignal): Promise<string> {
    return (await this.get('/agent/inference', TxSchema, { id: receiptId }, signal)).tx_hash;
  }

  async reportBridge(
    signature: string,
    amountLamports: number,
    destinationChainId: number,
    signal?: AbortSignal
  ): Promise<void> {
    const url = this.bridgeURL ? `${this.bridgeURL.replace(/\/$/, '')}/deposit` : '/bridge/deposit';
    await this.post(
      url,
      z.unknown(),
      {
        address: this.address,
        signature,
        amount: amountLamports,
        destination_chain_id: destinationChainId,
      },
      signal
    );
  }

  async getSocialStatus(signal?: AbortSignal): Promise<SocialStatus> {
    const status = await this.get('/me/social', SocialStatusSchema, {}, signal);
    return {
      bound: { twitter: status.twitter_bound, discord: status.discord_bound },
      tasks: status.tasks.map((t) => ({ id: t.id, platform: t.platform, title: t.title, completed: t.is_completed })),
    };
  }

  async bindSocial(platform: SocialPlatform, handle: string, signal?: AbortSignal): Promise<void> {
    await this.post(`/me/social/${platform}`, z.unknown(), { address: this.address, handle }, signal);
  }

  async completeSocialTask(taskId: number, signal?: AbortSignal): Promise<void> {
    await this.post('/me/social/tasks/complete', z.unknown(), { task_id: taskId }, signal);
  }

  async getPortalBalance(signal?: AbortSignal): Promise<number> {
    return (await this.get('/me/balance', BalanceSchema, {}, signal)).balances.token;
  }

  async getStakes(signal?: AbortSignal): Promise<StakePosition[]> {
    const staked = await this.get('/me/staked', StakedSchema, {}, signal);
    return staked.subnets.map((s) => ({ subnetAddress: s.subnet_address, amount: s.my_staked_amount }));
  }

  async stake(subnetAddress: string, amount: number, signal?: AbortSignal): Promise<string> {
    return (await this.post('/subnet/delegate', TxSchema, { amount, subnet_address: subnetAddress }, signal)).tx_hash;
  }

  async claimStakingRewards(subnetAddress: string, signal?: AbortSignal): Promise<RewardClaim> {
    const claim = await this.post('/subnet/claim-rewards', ClaimSchema, { subnet_address: subnetAddress }, signal);
    return { txHash: claim.tx_hash, amount: claim.claim_amount };
  }

  /**
   * The bearer token only goes to the portal's own endpoints; absolute URLs
   * belong to other services.
   */
  private headersFor(url: string): Record<string, string> {
    if (/^https?:\/\//i.test(url)) return {};
    if (url.startsWith('/auth/') && url !== '/auth/register') return {};
    return this.authHeaders();
  }

  private authHeaders(): Record<string, string> {
    if (!this.token) {
      throw new Error('Portal session not signed in');
    }
    return { Authorization: `Bearer ${this.token}` };
  }

  private async get<T extends z.ZodTypeAny>(
    url: string,
    schema: T,
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<z.output<T>> {
    const response = await this.http.get(url, { headers: this.headersFor(url), params, signal });
    return this.unwrap(url, schema, response.data);
  }

  private async post<T extends z.ZodTypeAny>(
    url: string,
    schema: T,
    body: unknown,
    signal?: AbortSignal
  ): Promise<z.output<T>> {
    const response = await this.http.post(url, body, { headers: this.headersFor(url), signal });
    return this.unwrap(url, schema, response.data);
  }

  private unwrap<T extends z.ZodTypeAny>(url: string, schema: T, body: unknown): z.output<T> {
    const parsed = EnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${url}: not a JSON envelope`);
    }
    if (parsed.data.error) {
      throw new Error(`${url}: ${parsed.data.error}`);
    }

    const data = schema.safeParse(parsed.data.data);
    if (!data.success) {
      throw new Error(`Unexpected response from ${url}: ${data.error.issues[0]?.message ?? 'invalid body'}`);
    }
    return data.data;
  }
}
