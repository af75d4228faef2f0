/**
 * Pool name to Binance spot symbol resolution
 *
 * "WETH/USDC" -> "ETH" -> "ETHUSDT". A leading "W" (wrapped) is stripped from
 * each side and the first supported token wins.
 */

import { InvalidInputError } from '@rangekeeper/shared';

export const SUPPORTED_TOKENS = ['ETH', 'SOL', 'DOGE', 'XRP', 'BTC', 'BNB'] as const;

export type SupportedToken = (typeof SUPPORTED_TOKENS)[number];

export const BINANCE_SYMBOLS: Record<SupportedToken, string> = {
  ETH: 'ETHUSDT',
  SOL: 'SOLUSDT',
  DOGE: 'DOGEUSDT',
  XRP: 'XRPUSDT',
  BTC: 'BTCUSDT',
  BNB: 'BNBUSDT',
};

function isSupportedToken(token: string): token is SupportedToken {
  return (SUPPORTED_TOKENS as readonly string[]).includes(token);
}

/**
 * Token symbol of a "BASE/QUOTE" pool name: the first supported token,
 * otherwise the cleaned base token.
 */
export function resolveTokenSymbol(poolName: string): string {
  const cleaned = poolName
    .split('/')
    .map((token) => (token.startsWith('W') ? token.slice(1) : token).toUpperCase());

  return cleaned.find(isSupportedToken) ?? cleaned[0] ?? '';
}

/**
 * Binance USDT pair for a pool name
 *
 * @throws InvalidInputError if the pool's token has no Binance symbol
 */
export function resolveBinanceSymbol(poolName: string): string {
  const token = resolveTokenSymbol(poolName);

  if (!isSupportedToken(token)) {
    throw new InvalidInputError(
      `Binance symbol not found for token '${token}'. Supported tokens: ${SUPPORTED_TOKENS.join(', ')}`,
      { poolName, token }
    );
  }

  return BINANCE_SYMBOLS[token];
}
