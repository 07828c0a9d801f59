import { createArchiveClients } from "../archive";
import { loadConfig } from "../config";
import { CommandContext, runBasicSearch, runFullSearch, runOcrOnly } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createTextExtractor, TextExtractor, UnavailableTextExtractor } from "../ocr";
import { createStore } from "../store";
import { parsePeriod } from "./period";

interface CommonCliArgs {
  query?: string;
  period?: string;
  maxDocs?: number;
  configPath?: string;
}

export type ParsedCliArgs = CommonCliArgs & ({ mode: "search" | "full" } | { mode: "ocr-only"; ocrOnlyDir: string });

const HELP_TEXT = `
Usage:
  correspondence-finder [options]

Searches the configured archives for the letter from Colonel Bryan Charles
Fairfax to Winston Churchill (Oct-Dec 1946), downloads candidate documents,
OCRs them, and ranks letter candidates.

Options:
  --query <text>          Extra search phrase, issued first on every archive
  --period <YYYY-MM to YYYY-MM>
                          Date window sent to archives that accept one
  --full                  Run search, download, OCR and letter extraction
  --ocr-only <dir>        OCR every image directory under <dir>; no searching
  --max-docs <n>          Maximum documents to download (default: 5)
  --config <path>         Optional path to JSON config file
  -h, --help              Show this help
`;

function valueAfter(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value !== undefined && !value.startsWith("--") ? value : undefined;
}

/** Accepts both `--period "1946-10 to 1946-12"` and the unquoted three-token form. */
function periodValue(argv: string[]): string | undefined {
  const index = argv.indexOf("--period");
  if (index < 0) {
    return undefined;
  }
  const first = argv[index + 1];
  if (first === undefined || first.startsWith("--")) {
    return undefined;
  }
  if (argv[index + 2]?.toLowerCase() === "to" && argv[index + 3] !== undefined) {
    return `${first} to ${argv[index + 3]}`;
  }
  return first;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const ocrOnlyDir = valueAfter(argv, "--ocr-only");
  if (argv.includes("--ocr-only") && !ocrOnlyDir) {
    return "help";
  }

  const maxDocsRaw = valueAfter(argv, "--max-docs");
  const maxDocsParsed = maxDocsRaw ? Number.parseInt(maxDocsRaw, 10) : undefined;
  const maxDocs = maxDocsParsed !== undefined && Number.isFinite(maxDocsParsed) && maxDocsParsed > 0 ? maxDocsParsed : undefined;

  const common: CommonCliArgs = {
    query: valueAfter(argv, "--query"),
    period: periodValue(argv),
    maxDocs,
    configPath: valueAfter(argv, "--config"),
  };

  if (ocrOnlyDir) {
    return { ...common, mode: "ocr-only", ocrOnlyDir };
  }
  return { ...common, mode: argv.includes("--full") ? "full" : "search" };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = loadConfig(parsed.configPath);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });

  let window = config.searchWindow;
  if (parsed.period) {
    const requested = parsePeriod(parsed.period);
    if (requested) {
      window = requested;
    } else {
      logger.warn("period_invalid_ignored", { period: parsed.period, window });
    }
  }

  logger.info("command_start", {
    mode: parsed.mode,
    query: parsed.query,
    window,
    maxDocs: parsed.maxDocs ?? config.defaultMaxDocs,
    archives: config.archives.map((archive) => archive.name),
  });

  let textExtractor: TextExtractor = new UnavailableTextExtractor();
  if (parsed.mode !== "search") {
    textExtractor = await createTextExtractor(config, logger.child("ocr"));
    if (!textExtractor.available) {
      logger.error("ocr_dependencies_missing", {
        tesseractPath: config.tesseractPath,
        hint: "install Tesseract OCR and make sure it is on PATH, or set TESSERACT_PATH",
      });
      return 0;
    }
  }

  const store = createStore(config);
  const context: CommandContext = {
    runId,
    config,
    store,
    logger,
    metrics,
    clients: createArchiveClients({ config, logger, metrics }),
    textExtractor,
  };

  try {
    switch (parsed.mode) {
      case "ocr-only": {
        const report = await runOcrOnly({ ...context, logger: logger.child("ocr-only") }, parsed.ocrOnlyDir);
        if (report) {
          logger.info("command_result", { ...report, letters: report.letters.length });
        }
        break;
      }
      case "full": {
        const result = await runFullSearch(
          { ...context, logger: logger.child("pipeline") },
          { window, query: parsed.query, maxDocs: parsed.maxDocs ?? config.defaultMaxDocs },
        );
        logger.info("command_result", { ...result });
        break;
      }
      case "search": {
        const report = await runBasicSearch({ ...context, logger: logger.child("search") }, { window, query: parsed.query });
        logger.info("command_result", { ...report });
        break;
      }
    }

    logger.info("command_complete", { mode: parsed.mode, summary: await store.getRunSummary(runId) });
    return 0;
  } finally {
    await store.close();
    logger.info("metrics_summary", { ...metrics.snapshot() });
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
