import { z } from 'zod';

export type LLMProvider = 'openai' | 'claude' | 'gemini' | 'deepseek' | 'openrouter';

export const LLM_PROVIDERS = ['openai', 'claude', 'gemini', 'deepseek', 'openrouter'] as const;

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature?: number;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/** Anything that can complete a chat; `LLMService` is the HTTP-backed one. */
export interface ChatCompleter {
  complete(messages: LLMMessage[], signal?: AbortSignal): Promise<LLMResponse>;
}

const OPENAI_COMPATIBLE_URLS = {
  openai: 'https://api.openai.com/v1/chat/completions',
  deepseek: 'https://api.deepseek.com/v1/chat/completions',
  openrouter: 'https://openrouter.ai/api/v1/chat/completions',
} as const;

const OpenAIResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })).min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

const ClaudeResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }),
});

const GeminiResponseSchema = z.object({
  candidates: z
    .array(z.object({ content: z.object({ parts: z.array(z.object({ text: z.string() })).min(1) }) }))
    .min(1),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

/** Chat completion over the providers' HTTP APIs; DeepSeek and OpenRouter speak the OpenAI format. */
export class LLMService implements ChatCompleter {
  private config: LLMConfig;
  private fetchImpl: typeof fetch;

  constructor(config: LLMConfig, fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async complete(messages: LLMMessage[], signal?: AbortSignal): Promise<LLMResponse> {
    switch (this.config.provider) {
      case 'openai':
      case 'deepseek':
      case 'openrouter':
        return this.completeOpenAICompatible(OPENAI_COMPATIBLE_URLS[this.config.provider], messages, signal);
      case 'claude':
        return this.completeClaude(messages, signal);
      case 'gemini':
        return this.completeGemini(messages, signal);
    }
  }

  private async completeOpenAICompatible(
    url: string,
    messages: LLMMessage[],
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.config.apiKey}`,
    };
    if (this.config.provider === 'openrouter') {
      headers['X-Title'] = 'support-mesh';
    }

    const data = OpenAIResponseSchema.parse(
      await this.post(url, headers, {
        model: this.config.model,
        messages,
        temperature: this.config.temperature ?? 0.7,
      }, signal)
    );

    return {
      content: data.choices[0].message.content.trim(),
      usage: data.usage,
    };
  }

  private async completeClaude(messages: LLMMessage[], signal?: AbortSignal): Promise<LLMResponse> {
    const systemMessage = messages.find(m => m.role === 'system');
    const conversationMessages = messages.filter(m => m.role !== 'system');

    const data = ClaudeResponseSchema.parse(
      await this.post('https://api.anthropic.com/v1/messages', {
        'Content-Type': 'application/json',
        'x-api-key': this.config.apiKey,
        'anthropic-version': '2023-06-01',
      }, {
        model: this.config.model,
        max_tokens: 4096,
        system: systemMessage?.content || '',
        messages: conversationMessages.map(m => ({
          role: m.role === 'assistant' ? 'assistant' : 'user',
          content: m.content,
        })),
        temperature: this.config.temperature ?? 0.7,
      }, signal)
    );

    const text = data.content.map(block => block.text ?? '').join('');
    return {
      content: text,
      usage: {
        prompt_tokens: data.usage.input_tokens,
        completion_tokens: data.usage.output_tokens,
        total_tokens: data.usage.input_tokens + data.usage.output_tokens,
      },
    };
  }

  private async completeGemini(messages: LLMMessage[], signal?: AbortSignal): Promise<LLMResponse> {
    const systemMessage = messages.find(m => m.role === 'system');
    const conversationMessages = messages.filter(m => m.role !== 'system');

    const contents = conversationMessages.map(m => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

    const data = GeminiResponseSchema.parse(
      await this.post(
        `https://generativelanguage.googleapis.com/v1beta/models/${this.config.model}:generateContent?key=${this.config.apiKey}`,
        { 'Content-Type': 'application/json' },
        {
          contents,
          systemInstruction: systemMessage
            ? { parts: [{ text: systemMessage.content }] }
            : undefined,
          generationConfig: {
            temperature: this.config.temperature ?? 0.7,
            maxOutputTokens: 4096,
          },
        },
        signal
      )
    );

    return {
      content: data.candidates[0].content.parts[0].text,
      usage: {
        prompt_tokens: data.usageMetadata?.promptTokenCount || 0,
        completion_tokens: data.usageMetadata?.candidatesTokenCount || 0,
        total_tokens: data.usageMetadata?.totalTokenCount || 0,
      },
    };
  }

  private async post(
    url: string,
    headers: Record<string, string>,
    body: unknown,
    signal?: AbortSignal
  ): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.config.provider} error: ${response.status} - ${error}`);
    }

    return response.json();
  }
}

/** Strips the markdown fences models like to wrap JSON answers in. */
export function sanitizeModelJSON(content: string): string {
  let text = content.trim();
  if (text.startsWith('```json')) {
    text = text.replace(/```json\s*/i, '').replace(/```/g, '');
  } else if (text.startsWith('```')) {
    text = text.replace(/```\s*/g, '');
  }
  return text.trim();
}
