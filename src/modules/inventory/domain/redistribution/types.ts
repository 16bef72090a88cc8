export interface RedistributionParams {
  windowDays: number;
  /** Window sales a destination needs before it can receive a transfer. */
  minDestinationSales: number;
  originStore?: string | null;
  asOf: Date;
}

/** Per store and item position used to pick origins and destinations. */
export interface StorePosition {
  storeKey: string;
  storeName: string;
  region: string;
  fixed: boolean;
  itemCode: string;
  brand: string;
  stock: number;
  minimumStock: number;
  sales: number;
}

export interface RedistributionSuggestion {
  region: string;
  itemCode: string;
  brand: string;
  originStore: string;
  destinationStore: string;
  originStock: number;
  destinationStock: number;
  suggestedQuantity: number;
}

export interface RedistributionSummary {
  totalSuggestions: number;
  suggestedUnits: number;
  skippedSalesRows: number;
  skippedStockRows: number;
}

export interface RedistributionResult {
  suggestions: RedistributionSuggestion[];
  summary: RedistributionSummary;
}
