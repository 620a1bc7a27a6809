import { parseArgs } from "node:util";
import path from "node:path";
import { loadBankConfigs, type BankConfigStore } from "./config/banks";
import {
  expandHome,
  loadSettings,
  parseOutputFormat,
  type OutputFormat,
  type Settings,
} from "./config/env";
import { ConfigError, describeError } from "./errors";
import { logger, setLogLevel } from "./logger";
import { convertFiles, formatSummary } from "./run";

export const USAGE = `Usage: npm start -- [options] [files...]

Converts bank exports into one transaction layout. Without files, every
configured bank's export directory is searched.

Options:
  --config <path>     bank configuration file (default: $BANK_CONFIG_PATH or config/banks.json)
  --bank <id>         treat every input as this bank instead of detecting it
  --input-dir <dir>   directory searched when no files are given
                      (default: $INPUT_DIR or ~/Downloads)
  --format <csv|xlsx> output format (default: $OUTPUT_FORMAT or csv)
  --dry-run           convert without writing output files
  --list-banks        print the configured banks and exit
  --verbose           debug logging
  --help              show this message`;

export type CliOptions = {
  files: string[];
  configPath: string;
  bankId?: string;
  inputDir: string;
  format: OutputFormat;
  dryRun: boolean;
  listBanks: boolean;
  verbose: boolean;
  help: boolean;
};

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        config: { type: "string" },
        bank: { type: "string" },
        "input-dir": { type: "string" },
        format: { type: "string" },
        "dry-run": { type: "boolean", default: false },
        "list-banks": { type: "boolean", default: false },
        verbose: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new ConfigError(describeError(error), { cause: error });
  }
}

export function parseCliArgs(
  argv: readonly string[],
  settings: Settings
): CliOptions {
  const { values, positionals } = readArgs(argv);
  return {
    files: positionals,
    configPath: values.config ? path.resolve(values.config) : settings.bankConfigPath,
    bankId: values.bank,
    inputDir: values["input-dir"] ? expandHome(values["input-dir"]) : settings.inputDir,
    format: values.format ? parseOutputFormat(values.format) : settings.outputFormat,
    dryRun: values["dry-run"] === true,
    listBanks: values["list-banks"] === true,
    verbose: values.verbose === true,
    help: values.help === true,
  };
}

export function formatBankList(store: BankConfigStore): string {
  return store
    .list()
    .map((bank) => `${bank.id}\t${bank.name} (${bank.format})`)
    .join("\n");
}

/** Runs the converter; resolves to the process exit code. */
export async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  let store: BankConfigStore;
  try {
    const settings = loadSettings();
    options = parseCliArgs(argv, settings);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }
    setLogLevel(options.verbose ? "debug" : settings.logLevel);
    store = await loadBankConfigs(options.configPath);
    if (options.bankId) store.require(options.bankId);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error("Run with --help for usage.");
      return 2;
    }
    throw error;
  }

  if (options.listBanks) {
    console.log(formatBankList(store));
    return 0;
  }

  logger.debug("Loaded bank configuration", {
    file: options.configPath,
    banks: store.size,
  });
  const summary = await convertFiles(
    {
      files: options.files,
      bankId: options.bankId,
      inputDir: options.inputDir,
      format: options.format,
      dryRun: options.dryRun,
    },
    { store }
  );
  console.log(formatSummary(summary));
  return summary.failed.length > 0 ? 1 : 0;
}
