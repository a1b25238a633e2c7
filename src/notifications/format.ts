const NUMBER_EMOJI = ['1️⃣', '2️⃣', '3️⃣', '4️⃣', '5️⃣', '6️⃣', '7️⃣', '8️⃣', '9️⃣', '🔟'];

function trimZeros(text: string): string {
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Adaptive decimals so that both BTC and sub-cent tokens read well:
 * 0.00001234 -> '0.00001234', 0.5 -> '0.5', 64250.5 -> '64250.5'.
 */
export function formatPrice(value: number): string {
  if (value === 0 || !Number.isFinite(value)) return '0';
  const abs = Math.abs(value);
  if (abs < 0.0001) return value.toFixed(8);
  if (abs < 0.01) return trimZeros(value.toFixed(7));
  if (abs < 1) return trimZeros(value.toFixed(6));
  if (abs < 10) return trimZeros(value.toFixed(4));
  if (abs < 1000) return trimZeros(value.toFixed(3));
  return trimZeros(value.toFixed(2));
}

/** 'ENA/USDT' -> 'USDT', 'BTC/USDT:USDT' -> 'USDT' */
export function quoteCurrency(symbol: string): string {
  const quote = symbol.split('/')[1]?.split(':')[0];
  return quote || 'USDT';
}

export function targetLabel(index: number): string {
  return NUMBER_EMOJI[index] ?? `${index + 1}.`;
}
