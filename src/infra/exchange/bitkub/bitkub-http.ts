import type { z } from "zod";
import {
  describeError,
  ExchangeRequestError,
  RateLimitedError,
  TransientNetworkError,
} from "../../../core/errors";
import { executeWithRetry, type RetryPolicy } from "../../../core/retry/retry-policy";
import { sleep as defaultSleep, type SleepFn } from "../../../shared/async";
import type { RequestGate } from "../../../shared/concurrency";
import type { BitkubConfig } from "../../config/schema";
import type { ClockOffsetTracker } from "../clock-offset";
import { parseRetryAfterMs, type RateLimitGuard } from "../rate-limit";
import { envelopeSchema, serverTimeSchema } from "./bitkub-schemas";
import { errorForCode, extractErrorCode, signRequest } from "./bitkub-utils";

/**
 * fetch 签名，测试中替换为进程内桩。
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/**
 * 单个接口请求的描述。
 */
export interface BitkubRequest<T> {
  method: "GET" | "POST";
  path: string;
  query?: Record<string, string | number>;
  body?: Record<string, string | number>;
  /** 是否需要 API Key 签名 */
  signed: boolean;
  /** 是否允许重试瞬时错误；下单仅在携带幂等令牌时开启 */
  retryTransient: boolean;
  /** 响应是否为 { error, result } 包装 */
  envelope: boolean;
  schema: z.ZodType<T>;
  /** 取消限流冷却与重试退避的等待 */
  signal?: AbortSignal;
}

export interface BitkubHttpOptions {
  config: BitkubConfig;
  timeoutMs: number;
  policy: RetryPolicy;
  gate: RequestGate;
  clock: ClockOffsetTracker;
  rateLimit: RateLimitGuard;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
}

const SERVER_TIME_PATH = "/api/v3/servertime";

/**
 * Bitkub v3 HTTP 客户端。
 * 每次尝试依次经过：限流冷却 → 时钟偏移校正 → 共享并发闸门 → 请求与解析；
 * 错误按类别交给 executeWithRetry 处理。
 */
export class BitkubHttpClient {
  private readonly config: BitkubConfig;
  private readonly timeoutMs: number;
  private readonly policy: RetryPolicy;
  private readonly gate: RequestGate;
  private readonly clock: ClockOffsetTracker;
  private readonly rateLimit: RateLimitGuard;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;

  constructor(options: BitkubHttpOptions) {
    this.config = options.config;
    this.timeoutMs = options.timeoutMs;
    this.policy = options.policy;
    this.gate = options.gate;
    this.clock = options.clock;
    this.rateLimit = options.rateLimit;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * 发送请求并按 schema 解析结果。
   */
  public request<T>(request: BitkubRequest<T>): Promise<T> {
    return executeWithRetry(
      async () => {
        await this.rateLimit.wait(request.signal);
        if (request.signed) {
          await this.clock.ensureFresh(() => this.fetchServerTime());
        }
        const payload = await this.gate.run(() => this.send(request));
        this.rateLimit.onSuccess();
        return this.decode(request, payload);
      },
      {
        policy: this.policy,
        sleep: this.sleep,
        retryTransient: request.retryTransient,
        signal: request.signal,
        onRateLimit: async (error) => {
          const cooldownMs = this.rateLimit.onRateLimit(error.retryAfterMs);
          console.warn("Bitkub 触发限流，进入冷却", { path: request.path, cooldownMs });
          await this.rateLimit.wait(request.signal);
        },
        onClockSkew: async () => {
          await this.clock.refresh(() => this.fetchServerTime());
        },
        onRetry: (event) => {
          console.warn("Bitkub 请求重试", {
            path: request.path,
            kind: event.kind,
            attempt: event.attempt,
            delayMs: event.delayMs,
            error: describeError(event.error),
          });
        },
      }
    );
  }

  /**
   * 服务器时间（毫秒），无需签名。
   */
  public fetchServerTime(): Promise<number> {
    return this.request({
      method: "GET",
      path: SERVER_TIME_PATH,
      signed: false,
      retryTransient: true,
      envelope: false,
      schema: serverTimeSchema,
    });
  }

  private async send<T>(request: BitkubRequest<T>): Promise<unknown> {
    const query = buildQuery(request.query);
    const requestPath = `${request.path}${query}`;
    const body = request.method === "POST" ? JSON.stringify(request.body ?? {}) : "";
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
    };
    if (request.signed) {
      const timestamp = String(this.clock.timestamp());
      headers["X-BTK-APIKEY"] = this.config.apiKey;
      headers["X-BTK-TIMESTAMP"] = timestamp;
      headers["X-BTK-SIGN"] = signRequest(
        this.config.apiSecret,
        timestamp,
        request.method,
        requestPath,
        body
      );
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(`${this.config.baseUrl}${requestPath}`, {
        method: request.method,
        headers,
        body: request.method === "POST" ? body : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new TransientNetworkError(`Bitkub 请求失败: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (response.status === 429) {
      throw new RateLimitedError(
        `Bitkub 限流 ${request.path}`,
        parseRetryAfterMs(response.headers.get("retry-after"))
      );
    }
    if (response.status >= 500) {
      throw new TransientNetworkError(`Bitkub 服务端错误 HTTP ${response.status}`, {
        status: response.status,
      });
    }
    const payload = parseJson(text);
    if (!response.ok) {
      const code = extractErrorCode(payload);
      if (code !== null) {
        throw errorForCode(code, request.path, response.status);
      }
      throw new ExchangeRequestError(`Bitkub 请求被拒绝 HTTP ${response.status}`, {
        status: response.status,
      });
    }
    if (payload === undefined) {
      throw new ExchangeRequestError(`Bitkub 响应不是有效 JSON (${request.path})`);
    }
    return payload;
  }

  private decode<T>(request: BitkubRequest<T>, payload: unknown): T {
    let result = payload;
    if (request.envelope) {
      const envelope = envelopeSchema.safeParse(payload);
      if (!envelope.success) {
        throw new ExchangeRequestError(`Bitkub 响应格式异常 (${request.path})`);
      }
      if (envelope.data.error !== 0) {
        throw errorForCode(envelope.data.error, request.path);
      }
      result = envelope.data.result;
    }
    const parsed = request.schema.safeParse(result);
    if (!parsed.success) {
      throw new ExchangeRequestError(
        `Bitkub 响应字段校验失败 (${request.path}): ${parsed.error.message}`
      );
    }
    return parsed.data;
  }
}

function buildQuery(query?: Record<string, string | number>): string {
  if (!query) {
    return "";
  }
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    params.append(key, String(value));
  }
  const encoded = params.toString();
  return encoded ? `?${encoded}` : "";
}

function parseJson(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
