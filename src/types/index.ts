export interface Product {
  id: string;
  name: string;
  description: string | null;
  price: number;
  category: string;
  createdAt: string;
  updatedAt: string;
}

export interface Prediction {
  predictionId: string;
  result: string;
  confidence: number;
  processingTime: number;
  timestamp: string;
}

export interface PageResponse<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
}

/** Source of uniformly distributed numbers in [0, 1). */
export type RandomSource = () => number;
