import Anthropic from '@anthropic-ai/sdk';
import Groq from 'groq-sdk';
import type { LlmConfig, LlmProvider } from './config';
import { LlmError, errorMessage, httpStatusOf } from './errors';

export interface ChatPrompt {
  system: string;
  user: string;
}

/** A hosted chat-completion API. Implementations return the raw answer text. */
export interface LlmClient {
  readonly provider: LlmProvider;
  complete(prompt: ChatPrompt): Promise<string>;
}

export class GroqClient implements LlmClient {
  readonly provider = 'groq' as const;
  private groq: Groq;

  constructor(private readonly config: LlmConfig) {
    this.groq = new Groq({ apiKey: config.apiKey });
  }

  async complete(prompt: ChatPrompt): Promise<string> {
    const completion = await this.groq.chat.completions.create({
      model: this.config.model,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
    });
    return completion.choices[0]?.message?.content ?? '';
  }
}

export class AnthropicClient implements LlmClient {
  readonly provider = 'anthropic' as const;
  private claude: Anthropic;

  constructor(private readonly config: LlmConfig) {
    this.claude = new Anthropic({ apiKey: config.apiKey });
  }

  async complete(prompt: ChatPrompt): Promise<string> {
    const response = await this.claude.messages.create({
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      system: prompt.system,
      messages: [{ role: 'user', content: prompt.user }],
    });
    return response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('');
  }
}

export function createLlmClient(config: LlmConfig): LlmClient {
  return config.provider === 'anthropic' ? new AnthropicClient(config) : new GroqClient(config);
}

/** Classifies a provider SDK error by the HTTP status it carries. */
export function toLlmError(error: unknown): LlmError {
  if (error instanceof LlmError) return error;

  const status = httpStatusOf(error);
  const details = errorMessage(error);
  if (status === 401 || status === 403) {
    return new LlmError('authentication', 'LLM authentication failed: check the API key', details);
  }
  if (status === 429) {
    return new LlmError('rate_limit', 'LLM rate limit exceeded, try again later', details);
  }
  return new LlmError('api', 'LLM request failed', details);
}

export class LLMService {
  constructor(private readonly client: LlmClient) {}

  get provider(): LlmProvider {
    return this.client.provider;
  }

  async answer(prompt: ChatPrompt): Promise<string> {
    let text: string;
    try {
      text = await this.client.complete(prompt);
    } catch (error) {
      console.error('Error calling LLM:', error);
      throw toLlmError(error);
    }

    const answer = text.trim();
    if (!answer) {
      throw new LlmError('api', 'The language model returned an empty response');
    }
    return answer;
  }
}
