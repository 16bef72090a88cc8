export interface BrandItemCoverage {
  itemCode: string;
  brand: string;
  color: string;
  salesInWindow: number;
  /** Configured stores holding stock of the item. */
  storesWith: string[];
  storesWithout: string[];
  stockTotal: number;
  potentialGap: number;
}

export interface StoreCoverage {
  store: string;
  region: string;
  topItemsCarried: number;
  topItemsMissing: number;
  topItemsSales: number;
  topItemsStock: number;
}

export interface BrandAnalysisSummary {
  totalItems: number;
  totalStores: number;
  storesWithTopItems: number;
  redistributionOpportunities: number;
}

export interface BrandAnalysis {
  brand: string;
  windowDays: number;
  summary: BrandAnalysisSummary;
  topItems: BrandItemCoverage[];
  stores: StoreCoverage[];
  recommendations: string[];
}
