import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { createBankStrategy, type BankStrategy, type StrategyFactory } from "./banks/strategy";
import type { BankConfig, BankConfigStore } from "./config/banks";
import type { FileLoader } from "./banks/handler";
import { NoMatchingBankError } from "./errors";
import { readSourceFile } from "./extractors/types";
import { logger } from "./logger";

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function listDirectory(directory: string): Promise<Dirent[] | null> {
  try {
    return await readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (isMissingDirectory(error)) return null;
    throw error;
  }
}

/** Whether a file name is a bank export this configuration should pick up. */
export function matchesSourceName(name: string, config: BankConfig): boolean {
  const { filenamePattern, useRegex, extension } = config.source;
  if (!filenamePattern) return false;
  if (extension && !name.toLowerCase().endsWith(extension.toLowerCase())) return false;
  if (config.output.prefix && name.includes(config.output.prefix)) return false;
  return useRegex
    ? new RegExp(`^(?:${filenamePattern})`).test(name)
    : name.startsWith(filenamePattern);
}

/**
 * Picks the bank configuration for a file and finds each bank's exports on
 * disk. Strategies are built once per bank, in configuration order.
 */
export class TransactionFileReader {
  private readonly strategies = new Map<string, BankStrategy>();

  constructor(
    private readonly store: BankConfigStore,
    private readonly createStrategy: StrategyFactory = createBankStrategy,
    private readonly load: FileLoader = readSourceFile
  ) {}

  strategyFor(bankId: string): BankStrategy {
    const cached = this.strategies.get(bankId);
    if (cached) return cached;
    const strategy = this.createStrategy(this.store.require(bankId));
    this.strategies.set(bankId, strategy);
    return strategy;
  }

  async detect(filePath: string): Promise<BankStrategy> {
    const source = await this.load(filePath);
    for (const config of this.store.list()) {
      const strategy = this.strategyFor(config.id);
      if (await strategy.matches(source)) {
        logger.debug("Detected bank", { bank: config.id, file: filePath });
        return strategy;
      }
    }
    throw new NoMatchingBankError(filePath);
  }

  async findFiles(config: BankConfig, defaultDir: string): Promise<string[]> {
    let directory = config.source.directory ?? defaultDir;
    let entries = await listDirectory(directory);
    if (!entries && directory !== defaultDir) {
      logger.warn(`Directory not found, using ${defaultDir}`, {
        bank: config.id,
        directory,
      });
      directory = defaultDir;
      entries = await listDirectory(directory);
    }
    if (!entries) {
      logger.warn("Input directory not found", { bank: config.id, directory });
      return [];
    }

    return entries
      .filter((entry) => entry.isFile() && matchesSourceName(entry.name, config))
      .map((entry) => path.join(directory, entry.name))
      .sort();
  }
}
