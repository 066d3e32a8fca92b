export type SamplingParams = {
  temperature: number;
  maxTokens: number;
  topP: number;
  topK: number;
};

export const DEFAULT_SAMPLING: Readonly<SamplingParams> = Object.freeze({
  temperature: 0.7,
  maxTokens: 2048,
  topP: 0.9,
  topK: 40
});

export type GenerateRequest = {
  model: string;
  prompt: string;
  sampling: SamplingParams;
};

export interface TextProvider {
  generate(request: GenerateRequest): Promise<string>;
}

export type ContentAnalysis = {
  analysisType: string;
  contentPreview: string;
  result: string;
};
