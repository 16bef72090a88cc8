export {
  BRAND_ANALYSIS_TOP_ITEMS,
  BRAND_ANALYSIS_WINDOW_DAYS,
  analyzeBrand,
} from './analyze';
export type {
  BrandAnalysis,
  BrandAnalysisSummary,
  BrandItemCoverage,
  StoreCoverage,
} from './types';
