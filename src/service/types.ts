export type BuildStatus = 'running' | 'completed';

export type BuildRecord = {
  id: string;
  name: string;
  sourceContent: string;
  target?: string;
  args: string[];
  status: BuildStatus;
  createdAt: string;
};

export type AnalysisRecord = {
  id: string;
  type: string;
  recommendations: string[];
  score: number;
};

export type BuildRequest = {
  buildName: string;
  sourceContent: string;
  target?: string;
  additionalArgs?: string[];
};

export type BuildResponse = {
  success: boolean;
  build_id: string;
  message: string;
  output: string | null;
};

export type AnalysisRequest = {
  sourceContent: string;
  analysisType?: string;
};

export type AnalysisResponse = {
  analysis_type: string;
  recommendations: string[];
  score: number;
  details: string;
};

export type UploadResponse = {
  message: string;
  filename: string;
  file_id: string;
  size: number;
};
