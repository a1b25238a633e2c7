import { z } from 'zod';
import { InvalidParameterError } from '../errors.js';
import { ATR_SMOOTHINGS } from '../indicators/index.js';

/** Params as they arrive from the environment: any field may still be a string. */
export type RawParams<T> = {
  [K in keyof T]?: T[K] extends readonly (infer E)[] ? readonly (E | string)[] : T[K] | string;
};

const period = z.coerce.number().int().positive();
const multiple = z.coerce.number().finite().nonnegative();

export const detectionParamsSchema = z.object({
  fastPeriod: period.default(5),
  slowPeriod: period.default(50),
  trendPeriod: period.default(200),
  atrPeriod: period.default(14),
  pullbackAtrMultiple: multiple.default(1.0),
  atrSmoothing: z.enum(ATR_SMOOTHINGS).default('ema'),
  // 0 disables the filter
  minAdx: multiple.default(0),
  adxPeriod: period.default(14),
  // 0 disables the filter
  volumeMultiple: multiple.default(0),
  volumePeriod: period.default(20),
  // bars to wait after a signal before the next one, 0 disables
  cooldownBars: z.coerce.number().int().nonnegative().default(0),
});

export type DetectionParams = z.infer<typeof detectionParamsSchema>;

export const tradeSetupParamsSchema = z.object({
  leverage: z.coerce.number().int().positive().default(20),
  riskAtr: multiple.default(2.2),
  pullLower: multiple.default(0.35),
  pullUpper: multiple.default(0.2),
  takeProfitMultiples: z.array(multiple).max(10).default([0.8, 1.6, 2.4, 3.5, 4.2, 5.0]),
});

export type TradeSetupParams = z.infer<typeof tradeSetupParamsSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`).join('; ');
}

export function parseDetectionParams(input: RawParams<DetectionParams> = {}): DetectionParams {
  const result = detectionParamsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidParameterError(`Invalid detection params: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function parseTradeSetupParams(input: RawParams<TradeSetupParams> = {}): TradeSetupParams {
  const result = tradeSetupParamsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidParameterError(`Invalid trade setup params: ${describeIssues(result.error)}`);
  }
  return result.data;
}
