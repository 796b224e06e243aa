import { existsSync } from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { parseTradingSymbol } from "../../core/exchange/symbol-mapper";
import type { TradingSymbol } from "../../core/exchange/models";
import { Decimal } from "../../shared/number";
import type {
  AppConfig,
  DbConfig,
  ExchangeConfig,
  StateConfig,
  SymbolConfig,
  TradingConfig,
} from "./schema";

type EnvSource = Record<string, string | undefined>;

let loaded = false;

/**
 * 加载 .env 文件（若存在），用于本地开发环境。
 * 生产环境可直接通过环境变量注入，不强制要求文件存在。
 */
function ensureEnvLoaded(): void {
  if (loaded) {
    return;
  }
  const envPath = path.resolve(process.cwd(), ".env");
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
  loaded = true;
}

/**
 * 将空字符串规整为 undefined，便于统一默认值处理。
 */
function emptyToUndefined(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * 必填字符串字段校验。
 */
function requiredString(key: string) {
  const message = `缺少必要环境变量: ${key}`;
  return z.preprocess(
    (value) => {
      const normalized = emptyToUndefined(value);
      return normalized === undefined ? "" : normalized;
    },
    z.string().min(1, message)
  );
}

/**
 * 可选字符串字段校验。
 */
function optionalString() {
  return z.preprocess(emptyToUndefined, z.string().optional());
}

/**
 * 可选字符串字段，未提供或为空时使用默认值。
 */
function stringField(defaultValue: string) {
  return optionalString().transform((value) => value ?? defaultValue);
}

/**
 * 解析整数并校验最小值，失败时记录 issue。
 */
function parseInteger(
  key: string,
  value: string,
  minValue: number,
  ctx: z.RefinementCtx
): number | typeof z.NEVER {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    ctx.addIssue({ code: "custom", message: `环境变量 ${key} 不是有效整数: ${value}` });
    return z.NEVER;
  }
  if (parsed < minValue) {
    ctx.addIssue({
      code: "custom",
      message: `环境变量 ${key} 必须大于等于 ${minValue}: ${parsed}`,
    });
    return z.NEVER;
  }
  return parsed;
}

/**
 * 可选整数字段，未提供时使用默认值。
 */
function intField(key: string, minValue: number, defaultValue: number) {
  return optionalString().transform((value, ctx) => {
    if (value === undefined) {
      return defaultValue;
    }
    return parseInteger(key, value, minValue, ctx);
  });
}

/**
 * 可选整数字段，未提供时为 undefined。
 */
function optionalIntField(key: string, minValue: number) {
  return optionalString().transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    return parseInteger(key, value, minValue, ctx);
  });
}

type DecimalBounds = { minInclusive?: number; minExclusive?: number; maxExclusive?: number };

/**
 * 解析 Decimal 并校验边界，失败时记录 issue。
 */
function parseDecimal(
  key: string,
  value: string,
  options: DecimalBounds,
  ctx: z.RefinementCtx
): Decimal | typeof z.NEVER {
  const decimal = Decimal(value);
  if (decimal.isNaN() || !decimal.isFinite()) {
    ctx.addIssue({ code: "custom", message: `环境变量 ${key} 不是有效数字: ${value}` });
    return z.NEVER;
  }
  if (options.minExclusive !== undefined && decimal.lte(options.minExclusive)) {
    ctx.addIssue({
      code: "custom",
      message: `环境变量 ${key} 必须大于 ${options.minExclusive}: ${value}`,
    });
    return z.NEVER;
  }
  if (options.minInclusive !== undefined && decimal.lt(options.minInclusive)) {
    ctx.addIssue({
      code: "custom",
      message: `环境变量 ${key} 必须大于等于 ${options.minInclusive}: ${value}`,
    });
    return z.NEVER;
  }
  if (options.maxExclusive !== undefined && decimal.gte(options.maxExclusive)) {
    ctx.addIssue({
      code: "custom",
      message: `环境变量 ${key} 必须小于 ${options.maxExclusive}: ${value}`,
    });
    return z.NEVER;
  }
  return decimal;
}

/**
 * 必填 Decimal 字段。
 */
function decimalField(key: string, options: DecimalBounds) {
  return requiredString(key).transform((value, ctx) => parseDecimal(key, value, options, ctx));
}

/**
 * 可选 Decimal 字段，未提供时使用默认值（可为 undefined）。
 */
function optionalDecimalField(key: string, options: DecimalBounds, defaultValue?: string) {
  return optionalString().transform((value, ctx) => {
    const raw = value ?? defaultValue;
    if (raw === undefined) {
      return undefined;
    }
    return parseDecimal(key, raw, options, ctx);
  });
}

/**
 * 可选布尔字段校验，未提供时返回默认值。
 */
function optionalBooleanField(key: string, defaultValue: boolean) {
  return optionalString().transform((value, ctx) => {
    if (value === undefined) {
      return defaultValue;
    }
    const normalized = value.toLowerCase();
    if (normalized === "true" || normalized === "1") {
      return true;
    }
    if (normalized === "false" || normalized === "0") {
      return false;
    }
    ctx.addIssue({
      code: "custom",
      message: `环境变量 ${key} 不是有效布尔值: ${value}`,
    });
    return z.NEVER;
  });
}

/**
 * 枚举字段，统一为小写并提供默认值。
 */
function lowerEnumField<const T extends readonly [string, ...string[]]>(
  key: string,
  values: T,
  defaultValue: T[number]
) {
  return z
    .preprocess((value) => {
      const normalized = emptyToUndefined(value);
      return typeof normalized === "string" ? normalized.toLowerCase() : normalized;
    }, z.enum(values, `环境变量 ${key} 仅支持 ${values.join(" / ")}`).optional())
    .transform((value) => value ?? defaultValue);
}

/**
 * 全局参数校验。
 */
const envSchema = z
  .object({
    GRID_SYMBOLS: requiredString("GRID_SYMBOLS"),
    ORDER_NOTIONAL_THB: optionalDecimalField("ORDER_NOTIONAL_THB", { minExclusive: 0 }, "100"),
    MIN_MOVE_PCT_FROM_LAST_TRADE: optionalDecimalField(
      "MIN_MOVE_PCT_FROM_LAST_TRADE",
      { minInclusive: 0, maxExclusive: 100 },
      "0.7"
    ),
    REFRESH_SEC: intField("REFRESH_SEC", 1, 60),
    COOLDOWN_SEC: intField("COOLDOWN_SEC", 0, 0),
    ORDER_TIMEOUT_SEC: intField("ORDER_TIMEOUT_SEC", 1, 120),
    DRY_RUN: optionalBooleanField("DRY_RUN", true),
    DRY_RUN_QUOTE_BALANCE: optionalDecimalField(
      "DRY_RUN_QUOTE_BALANCE",
      { minInclusive: 0 },
      "100000"
    ),
    SLIPPAGE_BPS: optionalDecimalField("SLIPPAGE_BPS", { minInclusive: 0, maxExclusive: 10000 }, "8"),
    FEE_RATE: optionalDecimalField("FEE_RATE", { minInclusive: 0, maxExclusive: 1 }, "0.0025"),
    PRICE_DECIMALS: intField("PRICE_DECIMALS", 0, 2),
    QTY_DECIMALS: intField("QTY_DECIMALS", 0, 6),
    EXCHANGE: lowerEnumField("EXCHANGE", ["bitkub"] as const, "bitkub"),
    BITKUB_API_KEY: optionalString(),
    BITKUB_API_SECRET: optionalString(),
    BITKUB_BASE_URL: stringField("https://api.bitkub.com"),
    HTTP_TIMEOUT_MS: intField("HTTP_TIMEOUT_MS", 100, 12000),
    RETRY_MAX_ATTEMPTS: intField("RETRY_MAX_ATTEMPTS", 1, 4),
    RETRY_BASE_DELAY_MS: intField("RETRY_BASE_DELAY_MS", 0, 600),
    RETRY_MAX_DELAY_MS: intField("RETRY_MAX_DELAY_MS", 0, 10000),
    EXCHANGE_MAX_CONCURRENCY: intField("EXCHANGE_MAX_CONCURRENCY", 1, 2),
    TIME_SYNC_INTERVAL_SEC: intField("TIME_SYNC_INTERVAL_SEC", 10, 300),
    STATE_BACKEND: lowerEnumField("STATE_BACKEND", ["json", "sqlite"] as const, "json"),
    STATE_DIR: stringField("data/state"),
    DB_PATH: stringField("data/grid-bot.db"),
  })
  .superRefine((data, ctx) => {
    if (!data.DRY_RUN && !data.BITKUB_API_KEY) {
      ctx.addIssue({
        code: "custom",
        message: "DRY_RUN=false 时必须提供 BITKUB_API_KEY",
        path: ["BITKUB_API_KEY"],
      });
    }
    if (!data.DRY_RUN && !data.BITKUB_API_SECRET) {
      ctx.addIssue({
        code: "custom",
        message: "DRY_RUN=false 时必须提供 BITKUB_API_SECRET",
        path: ["BITKUB_API_SECRET"],
      });
    }
  });

type EnvValues = z.infer<typeof envSchema>;

/**
 * 单个交易对的网格参数校验，字段名不含交易对前缀。
 */
function symbolSchema(prefix: string) {
  return z.object({
    lower: decimalField(`${prefix}_GRID_LOWER`, { minExclusive: 0 }),
    upper: decimalField(`${prefix}_GRID_UPPER`, { minExclusive: 0 }),
    lines: optionalIntField(`${prefix}_GRID_LINES`, 2),
    spacing: optionalDecimalField(`${prefix}_GRID_SPACING`, { minExclusive: 0 }),
    notional: optionalDecimalField(`${prefix}_ORDER_NOTIONAL_THB`, { minExclusive: 0 }),
    minMovePct: optionalDecimalField(`${prefix}_MIN_MOVE_PCT`, {
      minInclusive: 0,
      maxExclusive: 100,
    }),
  });
}

type SymbolEnvValues = z.infer<ReturnType<typeof symbolSchema>>;

/**
 * 将校验错误整理为可读信息。
 */
function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

/**
 * 解析交易对列表，去重并保持顺序。
 */
function parseSymbols(value: string): TradingSymbol[] {
  const seen = new Set<string>();
  const symbols: TradingSymbol[] = [];
  for (const item of value.split(",")) {
    if (!item.trim()) {
      continue;
    }
    const symbol = parseTradingSymbol(item);
    if (seen.has(symbol.id)) {
      continue;
    }
    seen.add(symbol.id);
    symbols.push(symbol);
  }
  if (symbols.length === 0) {
    throw new Error("GRID_SYMBOLS 至少需要一个交易对");
  }
  return symbols;
}

/**
 * 读取单个交易对的环境变量。
 */
function readSymbolEnv(source: EnvSource, symbol: TradingSymbol): SymbolEnvValues {
  const prefix = symbol.id;
  const result = symbolSchema(prefix).safeParse({
    lower: source[`${prefix}_GRID_LOWER`],
    upper: source[`${prefix}_GRID_UPPER`],
    lines: source[`${prefix}_GRID_LINES`],
    spacing: source[`${prefix}_GRID_SPACING`],
    notional: source[`${prefix}_ORDER_NOTIONAL_THB`],
    minMovePct: source[`${prefix}_MIN_MOVE_PCT`],
  });
  if (!result.success) {
    throw new Error(formatZodError(result.error));
  }
  // 字段均有效后再做跨字段校验
  const values = result.data;
  const issues: string[] = [];
  if (values.lower.gte(values.upper)) {
    issues.push(`${prefix}_GRID_LOWER 必须小于 ${prefix}_GRID_UPPER`);
  }
  if ((values.lines === undefined) === (values.spacing === undefined)) {
    issues.push(`${prefix}_GRID_LINES 与 ${prefix}_GRID_SPACING 必须且只能提供一个`);
  }
  if (issues.length > 0) {
    throw new Error(issues.join("; "));
  }
  return values;
}

/**
 * 读取全局环境变量。
 */
function readEnv(source: EnvSource): EnvValues {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(formatZodError(result.error));
  }
  return result.data;
}

/**
 * 取出带默认值的 Decimal 字段。默认值由 schema 保证存在。
 */
function withDefault(value: Decimal | undefined, key: string): Decimal {
  if (value === undefined) {
    throw new Error(`环境变量 ${key} 缺少默认值`);
  }
  return value;
}

/**
 * 构建单个交易对配置。
 */
function loadSymbolConfig(env: EnvValues, symbol: TradingSymbol, source: EnvSource): SymbolConfig {
  const values = readSymbolEnv(source, symbol);
  const minMovePct =
    values.minMovePct ?? withDefault(env.MIN_MOVE_PCT_FROM_LAST_TRADE, "MIN_MOVE_PCT_FROM_LAST_TRADE");
  return {
    symbol,
    grid: {
      lower: values.lower,
      upper: values.upper,
      mode: values.lines !== undefined ? "LINES" : "SPACING",
      lineCount: values.lines,
      spacing: values.spacing,
      priceDecimals: env.PRICE_DECIMALS,
    },
    hysteresis: {
      minMoveFraction: minMovePct.dividedBy(100),
    },
    sizing: {
      notional: values.notional ?? withDefault(env.ORDER_NOTIONAL_THB, "ORDER_NOTIONAL_THB"),
      slippageBps: withDefault(env.SLIPPAGE_BPS, "SLIPPAGE_BPS"),
      feeRate: withDefault(env.FEE_RATE, "FEE_RATE"),
      priceDecimals: env.PRICE_DECIMALS,
      quantityDecimals: env.QTY_DECIMALS,
    },
  };
}

/**
 * 构建交易循环配置。
 */
function loadTradingConfig(env: EnvValues): TradingConfig {
  return {
    refreshMs: env.REFRESH_SEC * 1000,
    cooldownMs: env.COOLDOWN_SEC * 1000,
    orderTimeoutMs: env.ORDER_TIMEOUT_SEC * 1000,
    dryRun: env.DRY_RUN,
    dryRunQuoteBalance: withDefault(env.DRY_RUN_QUOTE_BALANCE, "DRY_RUN_QUOTE_BALANCE"),
  };
}

/**
 * 构建交易所配置。实盘凭据已在校验阶段保证存在，模拟盘可为空。
 */
function loadExchangeConfig(env: EnvValues): ExchangeConfig {
  return {
    name: env.EXCHANGE,
    bitkub: {
      apiKey: env.BITKUB_API_KEY ?? "",
      apiSecret: env.BITKUB_API_SECRET ?? "",
      baseUrl: env.BITKUB_BASE_URL.replace(/\/+$/, ""),
    },
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    maxConcurrency: env.EXCHANGE_MAX_CONCURRENCY,
    timeSyncIntervalMs: env.TIME_SYNC_INTERVAL_SEC * 1000,
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
    },
  };
}

/**
 * 构建状态存储配置。
 */
function loadStateConfig(env: EnvValues): StateConfig {
  return {
    backend: env.STATE_BACKEND,
    dir: env.STATE_DIR,
  };
}

/**
 * 构建数据库配置。
 */
function loadDbConfig(env: EnvValues): DbConfig {
  return {
    path: env.DB_PATH,
  };
}

/**
 * 加载应用配置，供启动流程统一使用。未传入 source 时读取 process.env（含 .env 文件）。
 */
export function loadAppConfig(source?: EnvSource): AppConfig {
  if (!source) {
    ensureEnvLoaded();
  }
  const envSource: EnvSource = source ?? process.env;
  const env = readEnv(envSource);
  const symbols = parseSymbols(env.GRID_SYMBOLS);
  return {
    symbols: symbols.map((symbol) => loadSymbolConfig(env, symbol, envSource)),
    trading: loadTradingConfig(env),
    exchange: loadExchangeConfig(env),
    state: loadStateConfig(env),
    db: loadDbConfig(env),
  };
}
