import { readFile } from "node:fs/promises";
import iconv from "iconv-lite";
import { z } from "zod";
import { ConfigError } from "../errors";

export const CANONICAL_FIELDS = [
  "date",
  "payee",
  "memo",
  "amount",
  "inflow",
  "outflow",
  "flag",
] as const;

const COLUMN_FIELDS = [...CANONICAL_FIELDS, "skip"] as const;

export const OUTPUT_COLUMNS = [
  "Date",
  "Payee",
  "Memo",
  "Amount",
  "Inflow",
  "Outflow",
  "Source",
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];
export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const amountRuleSchema = z.discriminatedUnion("type", [
  /** One column carrying the sign. */
  z.object({ type: z.literal("signed"), invert: z.boolean().default(false) }),
  /** Separate inflow / outflow columns; amount = inflow - outflow. */
  z.object({ type: z.literal("split") }),
  /** Magnitude column plus an indicator column naming the direction. */
  z.object({
    type: z.literal("flag"),
    debit: z.string().min(1),
    credit: z.string().min(1).optional(),
  }),
]);

const bankSchema = z
  .object({
    id: z
      .string()
      .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "must be kebab-case"),
    name: z.string().min(1),
    format: z.enum(["csv", "pdf"]).default("csv"),
    preprocess: z.enum(["html-table"]).optional(),
    source: z
      .object({
        filenamePattern: z.string().default(""),
        useRegex: z.boolean().default(false),
        extension: z.string().default(".csv"),
        directory: z.string().optional(),
        encoding: z
          .string()
          .default("auto")
          .refine(
            (encoding) => encoding === "auto" || iconv.encodingExists(encoding),
            "unknown encoding"
          ),
        delimiter: z.string().min(1).default(","),
        headerRows: z.number().int().min(0).default(0),
        footerRows: z.number().int().min(0).default(0),
        hasHeader: z.boolean().default(true),
      })
      .default({}),
    signature: z.array(z.string().min(1)).default([]),
    columns: z
      .array(
        z.object({
          source: z.string().min(1),
          field: z.enum(COLUMN_FIELDS),
        })
      )
      .min(1),
    dateFormat: z
      .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
      .transform((value) => (typeof value === "string" ? [value] : value)),
    fillEmptyDates: z.boolean().default(false),
    payeeToMemo: z.boolean().default(false),
    amount: amountRuleSchema.default({ type: "split" }),
    decimalSeparator: z.enum([".", ","]).optional(),
    currencyMultiplier: z.number().positive().default(1),
    pdf: z
      .object({
        endMarkers: z.array(z.string().min(1)).default([]),
        ignorePatterns: z
          .array(z.string().refine(compiles, "invalid regular expression"))
          .default([]),
      })
      .default({}),
    output: z
      .object({
        prefix: z.string().default("normalized_"),
        extension: z.string().optional(),
        columns: z
          .array(z.enum(OUTPUT_COLUMNS))
          .min(1)
          .default(["Date", "Payee", "Memo", "Amount"]),
      })
      .default({}),
  })
  .superRefine((bank, ctx) => {
    const fields = new Set(bank.columns.map((column) => column.field));
    const requireField = (field: CanonicalField, reason: string) => {
      if (!fields.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["columns"],
          message: `no column mapped to "${field}" (${reason})`,
        });
      }
    };

    requireField("date", "every transaction needs a date");
    const sources = bank.columns.map((column) => column.source);
    const duplicate = sources.find((name, index) => sources.indexOf(name) !== index);
    if (duplicate !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["columns"],
        message: `source column "${duplicate}" is listed twice`,
      });
    }
    if (bank.amount.type === "split" && !fields.has("inflow") && !fields.has("outflow")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["columns"],
        message: 'split amounts need an "inflow" or "outflow" column',
      });
    }
    if (bank.amount.type !== "split") requireField("amount", `${bank.amount.type} amount rule`);
    if (bank.amount.type === "flag") requireField("flag", "flag amount rule");

    if (bank.source.useRegex && !compiles(bank.source.filenamePattern)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["source", "filenamePattern"],
        message: "invalid regular expression",
      });
    }
  });

const fileSchema = z.object({
  defaults: z.record(z.unknown()).default({}),
  banks: z.array(z.unknown()).min(1),
});

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type BankConfig = DeepReadonly<z.output<typeof bankSchema>>;
export type AmountRule = BankConfig["amount"];
export type ColumnMapping = BankConfig["columns"][number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Nested objects merge key by key; arrays and scalars from `entry` win. */
export function mergeDefaults(defaults: unknown, entry: unknown): unknown {
  if (!isRecord(defaults) || !isRecord(entry)) {
    return entry === undefined ? defaults : entry;
  }
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(entry)) {
    merged[key] = mergeDefaults(defaults[key], value);
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function formatIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const issuePath = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
    return `${issuePath}: ${issue.message}`;
  });
}

/**
 * Read-only lookup over the configured banks. Order is the configuration
 * order, which is also the detection order.
 */
export class BankConfigStore {
  private readonly byId: ReadonlyMap<string, BankConfig>;

  constructor(private readonly banks: readonly BankConfig[]) {
    const byId = new Map<string, BankConfig>();
    for (const bank of banks) {
      if (byId.has(bank.id)) {
        throw new ConfigError(`Duplicate bank id "${bank.id}"`);
      }
      byId.set(bank.id, bank);
    }
    this.byId = byId;
  }

  get size(): number {
    return this.banks.length;
  }

  list(): readonly BankConfig[] {
    return this.banks;
  }

  get(id: string): BankConfig | undefined {
    return this.byId.get(id);
  }

  require(id: string): BankConfig {
    const bank = this.get(id);
    if (!bank) {
      const known = this.banks.map((candidate) => candidate.id).join(", ");
      throw new ConfigError(`Unknown bank "${id}" (configured: ${known})`);
    }
    return bank;
  }
}

export function parseBankConfigs(raw: unknown): BankConfigStore {
  const file = fileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigError(
      `Invalid bank configuration:\n${formatIssues("", file.error).join("\n")}`
    );
  }

  const issues: string[] = [];
  const banks: BankConfig[] = [];
  file.data.banks.forEach((entry, index) => {
    const parsed = bankSchema.safeParse(mergeDefaults(file.data.defaults, entry));
    if (!parsed.success) {
      issues.push(...formatIssues(`banks[${index}]`, parsed.error));
      return;
    }
    const bank: BankConfig = deepFreeze(parsed.data);
    banks.push(bank);
  });

  if (issues.length > 0) {
    throw new ConfigError(`Invalid bank configuration:\n${issues.join("\n")}`);
  }
  return new BankConfigStore(Object.freeze(banks));
}

export async function loadBankConfigs(filePath: string): Promise<BankConfigStore> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Bank configuration not found: ${filePath}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Bank configuration is not valid JSON: ${filePath}`, {
      cause: error,
    });
  }
  return parseBankConfigs(raw);
}
