// Base market agent — one LLM-backed collaborator per pipeline stage
// Agents know nothing about runs or the orchestrator; they take plain inputs,
// an optional progress sink and an AbortSignal.

import type { z } from 'zod';
import type { ChatModel } from '../bridge/llm-client.js';
import { parseJsonOutput } from '../utils/json-output.js';

export interface AgentContext {
  signal?: AbortSignal;
  /** Progress line sink, e.g. the run log */
  log?: (text: string) => void;
}

/** What the pipeline needs from a stage collaborator */
export interface StageAgent<I, O> {
  readonly label: string;
  run(input: I, ctx?: AgentContext): Promise<O>;
}

export abstract class MarketAgent<I, O> implements StageAgent<I, O> {
  abstract readonly label: string;

  constructor(protected readonly llm: ChatModel) {}

  abstract run(input: I, ctx?: AgentContext): Promise<O>;

  protected chat(system: string, user: string, ctx: AgentContext = {}): Promise<string> {
    return this.llm.complete({ system, prompt: user, signal: ctx.signal });
  }

  /**
   * Ask for JSON and validate it. Unparsable or mis-shaped output is
   * replaced by `fallback(raw)` so the pipeline keeps going.
   */
  protected async askJson<T>(
    system: string,
    user: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    fallback: (raw: string) => T,
    ctx: AgentContext = {},
  ): Promise<T> {
    const raw = await this.chat(system, user, ctx);

    let json: unknown;
    try {
      json = parseJsonOutput(raw);
    } catch {
      return fallback(raw);
    }

    const parsed = schema.safeParse(json);
    return parsed.success ? parsed.data : fallback(raw);
  }
}

/** Bulleted list used in prompts */
export function bullets(items: readonly string[]): string {
  return items.map(i => `- ${i}`).join('\n');
}
