export type StockPolicyCategory =
  | 'fijo_especial'
  | 'fijo_normal'
  | 'multimarca'
  | 'jgl'
  | 'jgm'
  | 'default';

/** Minimums used when the policy table has no row for the category. */
export const STOCK_POLICY_FALLBACKS: Record<StockPolicyCategory, number> = {
  fijo_especial: 5,
  fijo_normal: 5,
  multimarca: 2,
  jgl: 3,
  jgm: 3,
  default: 4,
};

/** Labels accepted for the default category, in lookup order. */
export const DEFAULT_CATEGORY_ALIASES = ['default', 'general'] as const;

export const JGL_MARKER = 'JGL';
export const JGM_MARKER = 'JGM';
