export type RecommendationEntry = {
  readonly score: number;
  readonly recommendations: readonly string[];
};

export const DEFAULT_ANALYSIS_CATEGORY = 'optimization';

// Catch-all for `general` and anything not listed.
export const FALLBACK_RECOMMENDATIONS: RecommendationEntry = Object.freeze({
  score: 0.0,
  recommendations: Object.freeze([])
});

export const RECOMMENDATIONS: Readonly<Record<string, RecommendationEntry>> = Object.freeze({
  optimization: {
    score: 0.75,
    recommendations: [
      'Use multi-stage builds to reduce image size',
      'Combine RUN commands to reduce layer count',
      'Use .dockerignore to exclude unnecessary files'
    ]
  },
  security: {
    score: 0.65,
    recommendations: [
      "Use specific base image tags instead of 'latest'",
      'Run containers as non-root user',
      'Scan image for vulnerabilities'
    ]
  },
  performance: {
    score: 0.8,
    recommendations: [
      'Cache dependencies before adding application code',
      'Use minimal base images',
      'Optimize layer ordering'
    ]
  },
  general: FALLBACK_RECOMMENDATIONS
});

export function lookupRecommendations(analysisType: string): RecommendationEntry {
  return Object.hasOwn(RECOMMENDATIONS, analysisType) ? RECOMMENDATIONS[analysisType] : FALLBACK_RECOMMENDATIONS;
}
