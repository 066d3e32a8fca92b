import OpenAI, { type ClientOptions } from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { GenerateRequest, TextProvider } from './types';

// top_k is not part of the OpenAI schema; the Gemini-compatible endpoint accepts it.
type CompletionBody = ChatCompletionCreateParamsNonStreaming & { top_k?: number };

export class OpenAICompatProvider implements TextProvider {
  private client: OpenAI;

  constructor(opts: { apiKey: string; baseUrl?: string; fetch?: ClientOptions['fetch'] }) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseUrl,
      fetch: opts.fetch,
      maxRetries: 0
    });
  }

  async generate(request: GenerateRequest): Promise<string> {
    const body: CompletionBody = {
      model: request.model,
      messages: [{ role: 'user', content: request.prompt }],
      temperature: request.sampling.temperature,
      max_tokens: request.sampling.maxTokens,
      top_p: request.sampling.topP,
      top_k: request.sampling.topK
    };
    const completion = await this.client.chat.completions.create(body);
    return completion.choices[0]?.message?.content ?? '';
  }
}
