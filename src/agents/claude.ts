import Anthropic from '@anthropic-ai/sdk';
import type { TextProvider } from '../core/types.js';
import { ProviderError, describeError } from '../core/errors.js';

export interface ClaudeOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

// Structural slice of the SDK client, so tests can pass a stand-in
export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
  };
}

export function createAnthropicClient(opts: Pick<ClaudeOptions, 'apiKey' | 'timeoutMs'>): Anthropic {
  // Retries are owned by the judgment RetryPolicy
  return new Anthropic({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 0 });
}

export async function claudeComplete(client: MessagesClient, prompt: string, opts: ClaudeOptions): Promise<string> {
  let response: Anthropic.Message;
  try {
    response = await client.messages.create({
      model: opts.model,
      max_tokens: opts.maxTokens,
      temperature: opts.temperature,
      messages: [{ role: 'user', content: prompt }]
    });
  } catch (err) {
    const status = err instanceof Anthropic.APIError ? err.status : undefined;
    throw new ProviderError('claude', `request failed: ${describeError(err)}`, status, { cause: err });
  }

  const textBlock = response.content.find(block => block.type === 'text');
  if (!textBlock || textBlock.type !== 'text') {
    throw new ProviderError('claude', 'No text response from Claude');
  }

  return textBlock.text;
}

export function createClaudeProvider(opts: ClaudeOptions, client: MessagesClient = createAnthropicClient(opts)): TextProvider {
  return prompt => claudeComplete(client, prompt, opts);
}
