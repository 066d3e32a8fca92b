export type PromptTemplate = (content: string) => string;

export const DEFAULT_ANALYSIS_TYPE = 'general';

export const ANALYSIS_PROMPTS: Readonly<Record<string, PromptTemplate>> = Object.freeze({
  sentiment: (content: string) => `Analyze the sentiment of the following text:\n${content}`,
  summary: (content: string) => `Provide a concise summary of the following text:\n${content}`,
  keywords: (content: string) => `Extract key themes and keywords from the following text:\n${content}`,
  [DEFAULT_ANALYSIS_TYPE]: (content: string) => `Analyze the following content:\n${content}`
});

export function resolvePrompt(analysisType: string, content: string): string {
  const template = Object.hasOwn(ANALYSIS_PROMPTS, analysisType)
    ? ANALYSIS_PROMPTS[analysisType]
    : ANALYSIS_PROMPTS[DEFAULT_ANALYSIS_TYPE];
  return template(content);
}
