import { createLogger, type Logger } from "../logging/logger";
import type { StockAnalysis } from "../workflow/stock_analysis";
import { restoreAnalysis, toAnalysisRecord } from "./records";
import type { AnalysisRecord, AnalysisRepository, AnalysisSummary } from "./types";

/**
 * Process-local repository. Records are stored as serialized copies.
 */
export class InMemoryAnalysisRepository implements AnalysisRepository {
  private readonly records = new Map<number, AnalysisRecord>();
  private readonly idsByAnalysis = new Map<string, number>();
  private nextId = 1;
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger("store/memory")) {
    this.logger = logger;
  }

  async save(analysis: StockAnalysis): Promise<number> {
    const record: AnalysisRecord = structuredClone(toAnalysisRecord(analysis));
    const existing = this.idsByAnalysis.get(analysis.id);
    const id = existing ?? this.nextId++;

    this.records.set(id, record);
    this.idsByAnalysis.set(analysis.id, id);
    return id;
  }

  async findById(id: number): Promise<StockAnalysis | null> {
    const record = this.records.get(id);
    return record ? restoreAnalysis(structuredClone(record), this.logger) : null;
  }

  async listRecent(limit = 20): Promise<AnalysisSummary[]> {
    return [...this.records.entries()]
      .sort(([left], [right]) => right - left)
      .slice(0, Math.max(0, limit))
      .map(([id, record]) => ({
        id,
        analysisId: record.analysisId,
        symbol: record.stockInfo.symbol,
        stockName: record.stockInfo.name,
        period: record.period,
        status: record.status,
        createdAt: record.createdAt,
      }));
  }
}
