import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "../errors";

dotenv.config({ path: path.resolve(process.cwd(), ".env") });

export type LogLevel = "debug" | "info" | "warn" | "error";
export type OutputFormat = "csv" | "xlsx";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const OUTPUT_FORMATS: readonly OutputFormat[] = ["csv", "xlsx"];

export function optionalEnv(name: string, defaultValue: string): string {
  const value = process.env[name];
  return value ? value : defaultValue;
}

export function optionalEnvBool(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return defaultValue;
  return raw.toLowerCase() === "true";
}

export function expandHome(input: string): string {
  if (input === "~") return os.homedir();
  if (input.startsWith("~/")) return path.join(os.homedir(), input.slice(2));
  return input;
}

export function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === raw.toLowerCase());
  if (!level) {
    throw new ConfigError(
      `Unknown log level "${raw}" (expected ${LOG_LEVELS.join(", ")})`
    );
  }
  return level;
}

export function parseOutputFormat(raw: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(
    (candidate) => candidate === raw.toLowerCase()
  );
  if (!format) {
    throw new ConfigError(
      `Unknown output format "${raw}" (expected ${OUTPUT_FORMATS.join(", ")})`
    );
  }
  return format;
}

export type Settings = {
  bankConfigPath: string;
  inputDir: string;
  outputFormat: OutputFormat;
  logLevel: LogLevel;
};

/** Reads settings from the environment; throws ConfigError on bad values. */
export function loadSettings(): Settings {
  return {
    bankConfigPath: path.resolve(
      optionalEnv("BANK_CONFIG_PATH", "config/banks.json")
    ),
    // Bank exports usually land in the user's downloads folder.
    inputDir: expandHome(optionalEnv("INPUT_DIR", "~/Downloads")),
    outputFormat: parseOutputFormat(optionalEnv("OUTPUT_FORMAT", "csv")),
    logLevel: optionalEnvBool("DEBUG", false)
      ? "debug"
      : parseLogLevel(optionalEnv("LOG_LEVEL", "info")),
  };
}
