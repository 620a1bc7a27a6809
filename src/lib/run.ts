import { BankHandler, type FileReport } from "./banks/handler";
import type { BankStrategy } from "./banks/strategy";
import type { BankConfigStore } from "./config/banks";
import type { OutputFormat } from "./config/env";
import { describeError } from "./errors";
import { logger } from "./logger";
import { getOutputPath, writeTransactions } from "./output";
import { TransactionFileReader } from "./reader";

export type ConvertRequest = {
  /** Explicit inputs; when empty every bank's directory is searched. */
  files: readonly string[];
  /** Binds every input to this bank instead of detecting it. */
  bankId?: string;
  inputDir: string;
  format: OutputFormat;
  dryRun: boolean;
};

export type ConvertDeps = {
  store: BankConfigStore;
  reader?: TransactionFileReader;
  write?: typeof writeTransactions;
  outputPath?: (inputPath: string, prefix: string, extension: string) => string;
};

export type ProcessedFile = FileReport & {
  /** Null when the file produced no transactions. */
  outputPath: string | null;
  written: boolean;
};

export type FailedFile = {
  filePath: string;
  reason: string;
};

export type RunSummary = {
  processed: ProcessedFile[];
  failed: FailedFile[];
  filesProcessed: number;
};

type Job = { filePath: string; strategy?: BankStrategy };

async function collectJobs(
  request: ConvertRequest,
  store: BankConfigStore,
  reader: TransactionFileReader
): Promise<Job[]> {
  if (request.files.length > 0) {
    const strategy = request.bankId ? reader.strategyFor(request.bankId) : undefined;
    return request.files.map((filePath) => ({ filePath, strategy }));
  }

  const configs = request.bankId ? [store.require(request.bankId)] : store.list();
  const jobs: Job[] = [];
  for (const config of configs) {
    const strategy = reader.strategyFor(config.id);
    const found = await reader.findFiles(config, request.inputDir);
    jobs.push(...found.map((filePath) => ({ filePath, strategy })));
  }
  return jobs;
}

/**
 * Converts every input independently; a failing file is reported and never
 * stops the others.
 */
export async function convertFiles(
  request: ConvertRequest,
  deps: ConvertDeps
): Promise<RunSummary> {
  const reader = deps.reader ?? new TransactionFileReader(deps.store);
  const write = deps.write ?? writeTransactions;
  const outputPath = deps.outputPath ?? getOutputPath;
  const jobs = await collectJobs(request, deps.store, reader);

  const results = await Promise.all(
    jobs.map(async (job): Promise<ProcessedFile | FailedFile> => {
      try {
        const strategy = job.strategy ?? (await reader.detect(job.filePath));
        const handler = new BankHandler(strategy);
        const report = await handler.run(job.filePath);
        const transactions = handler.transactions;
        if (transactions.length === 0) {
          return { ...report, outputPath: null, written: false };
        }

        const { output } = strategy.config;
        const target = outputPath(
          job.filePath,
          output.prefix,
          output.extension ?? `.${request.format}`
        );
        if (!request.dryRun) {
          await write(target, transactions, output.columns, request.format);
          logger.info(`Wrote ${target}`, { bank: strategy.bankId, file: job.filePath });
        }
        return { ...report, outputPath: target, written: !request.dryRun };
      } catch (error) {
        const reason = describeError(error);
        logger.error(`Failed to convert ${job.filePath}`, { error: reason });
        return { filePath: job.filePath, reason };
      }
    })
  );

  const processed: ProcessedFile[] = [];
  const failed: FailedFile[] = [];
  for (const result of results) {
    if ("bankId" in result) processed.push(result);
    else failed.push(result);
  }
  return { processed, failed, filesProcessed: processed.length };
}

function describeOutput(file: ProcessedFile): string {
  if (!file.outputPath) return "nothing to write";
  return file.written ? file.outputPath : `${file.outputPath} (dry run)`;
}

export function formatSummary(summary: RunSummary): string {
  if (summary.processed.length === 0 && summary.failed.length === 0) {
    return "No input files found.";
  }

  const lines = [
    `Converted ${summary.filesProcessed} file(s), skipped ${summary.failed.length} file(s).`,
  ];
  for (const file of summary.processed) {
    lines.push(
      `  ${file.filePath} (${file.bankId}): ${file.transactions.length} transaction(s) -> ${describeOutput(file)}`
    );
    for (const error of file.skipped) {
      lines.push(`    row skipped: ${error.message}`);
    }
  }
  for (const file of summary.failed) {
    lines.push(`  ${file.filePath}: skipped (${file.reason})`);
  }
  return lines.join("\n");
}
