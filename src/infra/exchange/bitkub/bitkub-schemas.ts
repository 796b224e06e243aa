import { z } from "zod";
import { Decimal } from "../../../shared/number";

/**
 * 数值字段可能为数字或字符串，统一解析为 Decimal。
 */
const decimalField = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const decimal = Decimal(value);
  if (decimal.isNaN() || !decimal.isFinite()) {
    ctx.addIssue({ code: "custom", message: `无效的数值: ${value}` });
    return z.NEVER;
  }
  return decimal;
});

const integerField = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: "custom", message: `无效的整数: ${value}` });
    return z.NEVER;
  }
  return Math.trunc(parsed);
});

const idField = z.union([z.string(), z.number()]).transform((value) => String(value));

/**
 * 私有/公共接口的统一包装：{ error, result }。
 */
export const envelopeSchema = z.object({
  error: z.number(),
  result: z.unknown().optional(),
});

/**
 * /api/v3/servertime 直接返回毫秒数。
 */
export const serverTimeSchema = integerField;

/**
 * 成交记录有数组与对象两种格式，逐条解析，无效条目跳过。
 */
export const tradeTupleSchema = z
  .tuple([integerField, decimalField, decimalField], z.unknown())
  .transform(([ts, rate, amount]) => ({ ts, rate, amount }));

export const tradeObjectSchema = z.union([
  z.object({ ts: integerField, rat: decimalField, amt: decimalField }).transform((trade) => ({
    ts: trade.ts,
    rate: trade.rat,
    amount: trade.amt,
  })),
  z.object({ ts: integerField, rate: decimalField, amount: decimalField }),
]);

export const tradeEntrySchema = z.union([tradeTupleSchema, tradeObjectSchema]);

export const tradesResultSchema = z.array(z.unknown());

export type BitkubTrade = z.infer<typeof tradeEntrySchema>;

/**
 * place-bid / place-ask 的返回。
 */
export const placeOrderResultSchema = z.object({
  id: idField,
  ci: z.string().optional(),
  ts: integerField.optional(),
});

/**
 * order-info 中的成交明细。买单 amount 以计价币计，卖单以基础币计。
 */
export const orderHistorySchema = z.object({
  amount: decimalField,
  rate: decimalField,
  fee: decimalField.optional(),
  timestamp: integerField.optional(),
});

export const orderInfoSchema = z.object({
  id: idField,
  status: z.string(),
  amount: decimalField,
  rate: decimalField,
  fee: decimalField.optional(),
  filled: decimalField.optional(),
  partial_filled: z.boolean().optional(),
  history: z.array(orderHistorySchema).optional(),
});

export type BitkubOrderInfo = z.infer<typeof orderInfoSchema>;

export const balancesResultSchema = z.record(
  z.string(),
  z.object({
    available: decimalField,
    reserved: decimalField.optional(),
  })
);

export const cancelResultSchema = z.unknown();
