import "dotenv/config";

import { parseCliArgs } from "./cli_args";
import { loadRuntimeConfig } from "./config/env";
import { AnalysisError } from "./errors";
import { FileMarketDataProvider } from "./market/file_provider";
import { closePool } from "./store/postgres/client";
import { toAnalysisRecord } from "./store/records";
import {
  listRecentAnalyses,
  loadStockAnalysis,
  runBatchStockAnalysis,
  runStockAnalysis,
} from "./workflow/analysis_workflow";
import { buildWorkflowContext } from "./workflow/analysis_workflow_runtime";

function printJson(payload: unknown): void {
  console.log(JSON.stringify(payload, null, 2));
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadRuntimeConfig();
  const needsMarketData = args.loadId === undefined && args.listLimit === undefined;
  const provider = needsMarketData
    ? await FileMarketDataProvider.fromFile(args.dataPath)
    : FileMarketDataProvider.fromJson({ stocks: {} });
  const context = buildWorkflowContext(config, { marketData: provider, optionalData: provider });

  try {
    if (args.loadId !== undefined) {
      const analysis = await loadStockAnalysis(args.loadId, context);
      printJson({ mode: "load", id: args.loadId, result: analysis ? toAnalysisRecord(analysis) : null });
      return;
    }

    if (args.listLimit !== undefined) {
      printJson({ mode: "list", results: await listRecentAnalyses(context, args.listLimit) });
      return;
    }

    if (args.symbols.length === 0) {
      throw new AnalysisError("Pass --symbol <code> or --symbols <a,b,...>", "INVALID_REQUEST");
    }

    if (args.symbols.length === 1) {
      const [symbol = ""] = args.symbols;
      const result = await runStockAnalysis({ symbol, period: args.period, roles: args.roles }, context);
      printJson({
        mode: "single",
        ok: result.ok,
        recordId: result.recordId,
        missingRoles: result.missingRoles,
        error: result.ok ? undefined : result.error.toJSON(),
        result: toAnalysisRecord(result.analysis),
      });
      if (!result.ok) {
        process.exitCode = 1;
      }
      return;
    }

    const summary = await runBatchStockAnalysis({ symbols: args.symbols, period: args.period, roles: args.roles }, context, {
      onProgress: (done, total, outcome) => {
        console.error(`[runner] ${done}/${total} ${outcome.symbol}: ${outcome.status}`);
      },
    });
    printJson({ mode: "batch", ...summary });
    if (summary.completed < summary.total) {
      process.exitCode = 1;
    }
  } finally {
    if (config.postgresUrl) {
      await closePool();
    }
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof AnalysisError ? JSON.stringify(error.toJSON()) : error);
  process.exitCode = 1;
});
