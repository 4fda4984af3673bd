export const DEFAULT_MARKET_DATA_PATH = "data/sample_market.json";

export interface CliArgs {
  symbols: string[];
  period?: string;
  roles?: string[];
  dataPath: string;
  loadId?: number;
  listLimit?: number;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parsePositiveInt(value: string): number | undefined {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Flags without a value are ignored, as are unknown flags.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { symbols: [], dataPath: DEFAULT_MARKET_DATA_PATH };

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];

    if (current === "--list") {
      const next = argv[i + 1];
      const limit = next === undefined ? undefined : parsePositiveInt(next);
      args.listLimit = limit ?? 20;
      if (limit !== undefined) {
        i += 1;
      }
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      continue;
    }

    switch (current) {
      case "--symbol":
        args.symbols.push(next);
        break;
      case "--symbols":
        args.symbols.push(...splitList(next));
        break;
      case "--period":
        args.period = next;
        break;
      case "--roles":
        args.roles = splitList(next);
        break;
      case "--data":
        args.dataPath = next;
        break;
      case "--load": {
        const id = parsePositiveInt(next);
        if (id !== undefined) {
          args.loadId = id;
        }
        break;
      }
      default:
        continue;
    }
    i += 1;
  }

  return args;
}
