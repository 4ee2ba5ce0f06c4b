/**
 * Agent catalogue for AI dialogs (agents.json)
 */

import { z } from 'zod';
import rawAgents from './agents.json';
import { RandomSource, pick } from '../utils/random';

const AgentSchema = z.object({
  agent: z.string(),
  service: z.string(),
  questions: z.array(z.string()).min(1),
});

export type AgentPrompt = z.infer<typeof AgentSchema>;

export const AGENTS: readonly AgentPrompt[] = z.array(AgentSchema).min(1).parse(rawAgents);

/**
 * Pick an agent and one of its questions not yet asked in this run
 */
export function pickDialog(
  random: RandomSource,
  asked: ReadonlySet<string>,
  agents: readonly AgentPrompt[] = AGENTS
): { agent: AgentPrompt; question: string } | null {
  const open = agents
    .map((agent) => ({ agent, questions: agent.questions.filter((q) => !asked.has(q)) }))
    .filter((entry) => entry.questions.length > 0);

  const chosen = pick(random, open);
  if (!chosen) return null;

  const question = pick(random, chosen.questions);
  return question ? { agent: chosen.agent, question } : null;
}
