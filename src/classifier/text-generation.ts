/**
 * Signal Digest — Text Generation Service
 *
 * The classifier talks to the model through TextGenerator so tests can
 * substitute a double. The production implementation uses the Anthropic
 * Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';

export interface TextGenerationRequest {
  model: string;
  system: string;
  prompt: string;
  maxTokens: number;
}

export interface TextGenerationOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TextGenerator {
  /**
   * Resolve with the model's free-text answer. Rejects on transport
   * failure, timeout or a non-success status.
   */
  generate(request: TextGenerationRequest, options: TextGenerationOptions): Promise<string>;
}

export class AnthropicTextGenerator implements TextGenerator {
  private readonly client: Anthropic;

  constructor(apiKey: string, client?: Anthropic) {
    // One attempt per item; a failed call falls back to the default record
    this.client = client ?? new Anthropic({ apiKey, maxRetries: 0 });
  }

  async generate(request: TextGenerationRequest, options: TextGenerationOptions): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { timeout: options.timeoutMs, signal: options.signal }
    );

    const textContent = response.content.find(c => c.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text content in response');
    }

    return textContent.text;
  }
}
