import type { AnalysisStatus, FinalDecision, StockInfo } from "../workflow/states";
import type { StockAnalysis } from "../workflow/stock_analysis";

export interface StoredReview {
  role: string;
  agentName: string;
  rawOutput: string;
  summary: string;
  focusAreas: string[];
  createdAt: string;
}

/**
 * Persisted shape of one analysis.
 */
export interface AnalysisRecord {
  analysisId: string;
  stockInfo: StockInfo;
  period: string;
  status: AnalysisStatus;
  reviews: StoredReview[];
  teamDiscussion: string | null;
  finalDecision: FinalDecision | null;
  failureReason: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface AnalysisSummary {
  id: number;
  analysisId: string;
  symbol: string;
  stockName: string;
  period: string;
  status: AnalysisStatus;
  createdAt: string;
}

export interface AnalysisRepository {
  save(analysis: StockAnalysis): Promise<number>;
  findById(id: number): Promise<StockAnalysis | null>;
  listRecent(limit?: number): Promise<AnalysisSummary[]>;
}
