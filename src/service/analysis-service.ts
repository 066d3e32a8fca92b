import { logger } from '../observability/logger';
import type { IdGenerator } from '../storage/ids';
import type { RecordStore } from '../storage/record-store';
import { DEFAULT_ANALYSIS_CATEGORY, lookupRecommendations } from './recommendations';
import type { AnalysisRecord, AnalysisRequest, AnalysisResponse } from './types';

export class AnalysisService {
  constructor(
    private store: RecordStore<AnalysisRecord>,
    private ids: IdGenerator
  ) {}

  async analyze(req: AnalysisRequest): Promise<AnalysisResponse> {
    const type = req.analysisType ?? DEFAULT_ANALYSIS_CATEGORY;
    const entry = lookupRecommendations(type);
    const id = this.ids.next('analysis');
    const recommendations = [...entry.recommendations];

    await this.store.put(id, { id, type, recommendations, score: entry.score });
    logger.info('analysis completed', { id, type });

    return {
      analysis_type: type,
      recommendations,
      score: entry.score,
      details: `Analysis completed with ${recommendations.length} recommendations`
    };
  }
}
