import { config } from '../config';
import { ConversationContext, type ConversationTurn } from '../core/context';
import { ConfigurationError } from '../core/errors';
import { logger } from '../observability/logger';
import { OpenAICompatProvider } from './openai-compat';
import { DEFAULT_ANALYSIS_TYPE, resolvePrompt } from './prompts';
import { DEFAULT_SAMPLING, type ContentAnalysis, type SamplingParams, type TextProvider } from './types';

export type GenAIClientOptions = {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  provider?: TextProvider;
};

const PREVIEW_CHARS = 100;

function resolveApiKey(explicit: string | undefined, env: NodeJS.ProcessEnv): string {
  const candidates = [explicit, env.GOOGLE_GEMINI_API_KEY];
  for (const key of candidates) {
    if (typeof key === 'string' && key.trim() !== '') return key;
  }
  throw new ConfigurationError(
    'API key not provided. Set GOOGLE_GEMINI_API_KEY environment variable or pass apiKey option.'
  );
}

const SAMPLING_KEYS = ['temperature', 'maxTokens', 'topP', 'topK'] as const;

// Explicit `undefined` keeps the default.
function withDefaults(params: Partial<SamplingParams>): SamplingParams {
  const merged: SamplingParams = { ...DEFAULT_SAMPLING };
  for (const key of SAMPLING_KEYS) {
    const value = params[key];
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

export function previewContent(content: string): string {
  return content.length > PREVIEW_CHARS ? `${content.slice(0, PREVIEW_CHARS)}...` : content;
}

/**
 * Conversational wrapper over a text-generation provider.
 *
 * Conversation turns re-send the whole transcript as one flattened prompt,
 * so the prompt grows with every turn.
 */
export class GenAIClient {
  readonly model: string;
  private provider: TextProvider;
  private ctx = new ConversationContext();

  constructor(opts: GenAIClientOptions = {}, env: NodeJS.ProcessEnv = process.env) {
    const apiKey = resolveApiKey(opts.apiKey, env);
    this.model = opts.model ?? config.geminiModel;
    this.provider = opts.provider ?? new OpenAICompatProvider({ apiKey, baseUrl: opts.baseUrl ?? config.geminiBaseUrl });
    logger.info('genai client initialized', { model: this.model });
  }

  async generateText(prompt: string, params: Partial<SamplingParams> = {}): Promise<string> {
    try {
      const text = await this.provider.generate({
        model: this.model,
        prompt,
        sampling: withDefaults(params)
      });
      logger.info('text generation completed');
      return text;
    } catch (err) {
      logger.error('text generation failed', err);
      throw err;
    }
  }

  startConversation() {
    this.ctx.clear();
    logger.info('conversation started');
  }

  resetConversation() {
    this.startConversation();
  }

  async sendConversationTurn(userText: string): Promise<string> {
    this.ctx.append('user', userText);
    try {
      const reply = await this.provider.generate({
        model: this.model,
        prompt: this.ctx.render(),
        sampling: { ...DEFAULT_SAMPLING }
      });
      this.ctx.append('assistant', reply);
      logger.info('conversation turn processed', { turns: this.ctx.length });
      return reply;
    } catch (err) {
      logger.error('conversation turn failed', err);
      throw err;
    }
  }

  chat(userText: string): Promise<string> {
    return this.sendConversationTurn(userText);
  }

  async analyzeContent(content: string, analysisType: string = DEFAULT_ANALYSIS_TYPE): Promise<ContentAnalysis> {
    const result = await this.generateText(resolvePrompt(analysisType, content));
    logger.info('content analysis completed', { analysisType });
    return {
      analysisType,
      contentPreview: previewContent(content),
      result
    };
  }

  getHistory(): ConversationTurn[] {
    return this.ctx.snapshot();
  }

  clearHistory() {
    this.ctx.clear();
    logger.info('conversation history cleared');
  }
}
