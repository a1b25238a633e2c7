export { ema, wilder } from './ema.js';
export { sma } from './sma.js';
export { atr, trueRange, ATR_SMOOTHINGS } from './atr.js';
export type { AtrSmoothing } from './atr.js';
export { adx } from './adx.js';
export { assertPeriod, assertSameLength } from './series.js';
export type { IndicatorSeries } from './series.js';
