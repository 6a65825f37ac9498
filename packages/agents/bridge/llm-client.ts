// LLM bridge — the stage agents only see the ChatModel interface
// Anthropic Messages API is the production implementation

import Anthropic from '@anthropic-ai/sdk';

export interface ChatRequest {
  system?: string;
  prompt: string;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ChatModel {
  complete(request: ChatRequest): Promise<string>;
}

export interface AnthropicChatConfig {
  apiKey?: string;
  model: string;
  maxTokens: number;
}

export class AnthropicChatModel implements ChatModel {
  private client: Anthropic | null = null;

  constructor(private readonly config: AnthropicChatConfig) {}

  // Created on first use so a missing key fails the stage, not the process
  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new Error('ANTHROPIC_API_KEY environment variable is not set');
      }
      this.client = new Anthropic({ apiKey: this.config.apiKey });
    }
    return this.client;
  }

  async complete(request: ChatRequest): Promise<string> {
    const response = await this.getClient().messages.create(
      {
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        ...(request.system ? { system: request.system } : {}),
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal },
    );

    return response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  }
}
