import { describe, it, expect, beforeEach } from 'vitest';
import {
  createPublicClient,
  custom,
  decodeFunctionData,
  encodeFunctionResult,
  erc20Abi,
  hexToBigInt,
  isHex,
  numberToHex,
} from 'viem';
import type { Hex } from 'viem';
import { UpstreamUnavailableError } from '@rangekeeper/shared';
import { ViemChainStateProvider } from './viem-chain-state-provider.js';
import { UNISWAP_V3_POOL_ABI } from './pool-abi.js';

const POOL = '0x6c561b446416e1a00e8e93e221854d6ea4171372';
const TOKEN0 = '0x833589fcd6edb6e08f4c7c32d4f71b54bda02913';
const TOKEN1 = '0x4200000000000000000000000000000000000006';
const LATEST_BLOCK = 1_000n;
const GENESIS_TIME = 1_700_000_000n;

const CALL_ABI = [...UNISWAP_V3_POOL_ABI, ...erc20Abi];

interface RecordedCall {
  functionName: string;
  to: string;
  block: string;
}

/**
 * In-process EIP-1193 node: blocks every 2s, fixed pool state
 */
function createFakeNode(options: { failCalls?: boolean } = {}) {
  const calls: RecordedCall[] = [];

  const blockResponse = (blockNumber: bigint) => ({
    number: numberToHex(blockNumber),
    hash: numberToHex(blockNumber, { size: 32 }),
    timestamp: numberToHex(GENESIS_TIME + blockNumber * 2n),
    transactions: [],
  });

  const request = async ({ method, params }: { method: string; params?: unknown }) => {
    if (method === 'eth_chainId') {
      return numberToHex(8453);
    }

    if (method === 'eth_getBlockByNumber') {
      if (!Array.isArray(params)) {
        throw new Error('missing params');
      }
      const [tag] = params;
      if (tag === 'latest') {
        return blockResponse(LATEST_BLOCK);
      }
      if (typeof tag === 'string' && isHex(tag)) {
        return blockResponse(hexToBigInt(tag));
      }
      throw new Error(`unsupported block tag ${String(tag)}`);
    }

    if (method === 'eth_call') {
      if (options.failCalls) {
        throw new Error('execution reverted');
      }
      if (!Array.isArray(params)) {
        throw new Error('missing params');
      }
      const [call, block] = params;
      if (typeof call !== 'object' || call === null) {
        throw new Error('missing call object');
      }
      const data: unknown = Reflect.get(call, 'data');
      const to: unknown = Reflect.get(call, 'to');
      if (typeof data !== 'string' || !isHex(data) || typeof to !== 'string') {
        throw new Error('malformed call');
      }

      const decoded = decodeFunctionData({ abi: CALL_ABI, data });
      calls.push({ functionName: decoded.functionName, to: to.toLowerCase(), block: String(block) });
      return encodeCallResult(decoded.functionName, decoded.args, to.toLowerCase());
    }

    throw new Error(`unsupported method ${method}`);
  };

  return { request, calls };
}

function encodeCallResult(functionName: string, args: readonly unknown[] | undefined, to: string): Hex {
  switch (functionName) {
    case 'slot0':
      return encodeFunctionResult({
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'slot0',
        result: [1n << 96n, 0, 0, 1, 1, 0, true],
      });
    case 'feeGrowthGlobal0X128':
      return encodeFunctionResult({
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'feeGrowthGlobal0X128',
        result: 1000n,
      });
    case 'feeGrowthGlobal1X128':
      return encodeFunctionResult({
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'feeGrowthGlobal1X128',
        result: 2000n,
      });
    case 'ticks': {
      const tick = typeof args?.[0] === 'number' ? BigInt(args[0]) : 0n;
      return encodeFunctionResult({
        abi: UNISWAP_V3_POOL_ABI,
        functionName: 'ticks',
        result: [0n, 0n, 10n + tick, 20n + tick, 0n, 0n, 0, true],
      });
    }
    case 'token0':
      return encodeFunctionResult({ abi: UNISWAP_V3_POOL_ABI, functionName: 'token0', result: TOKEN0 });
    case 'token1':
      return encodeFunctionResult({ abi: UNISWAP_V3_POOL_ABI, functionName: 'token1', result: TOKEN1 });
    case 'decimals':
      return encodeFunctionResult({
        abi: erc20Abi,
        functionName: 'decimals',
        result: to === TOKEN0 ? 6 : 18,
      });
    default:
      throw new Error(`unexpected call ${functionName}`);
  }
}

function createProvider(options: { failCalls?: boolean } = {}) {
  const node = createFakeNode(options);
  const client = createPublicClient({ transport: custom(node, { retryCount: 0 }) });
  const provider = new ViemChainStateProvider({ client, poolAddress: POOL });
  return { provider, calls: node.calls };
}

describe('ViemChainStateProvider', () => {
  let provider: ViemChainStateProvider;
  let calls: RecordedCall[];

  beforeEach(() => {
    ({ provider, calls } = createProvider());
  });

  describe('block reads', () => {
    it('returns the latest block header', async () => {
      await expect(provider.latestBlock()).resolves.toEqual({
        number: 1000,
        timestamp: 1_700_002_000,
      });
    });

    it('returns the timestamp of a historical block', async () => {
      await expect(provider.blockTimestamp(250)).resolves.toBe(1_700_000_500);
    });
  });

  describe('pool reads', () => {
    it('reads fee growth globals at the requested block', async () => {
      await expect(provider.feeGrowthGlobals(500)).resolves.toEqual({
        feeGrowth0: 1000n,
        feeGrowth1: 2000n,
      });
      expect(calls.map((c) => c.functionName)).toEqual([
        'feeGrowthGlobal0X128',
        'feeGrowthGlobal1X128',
      ]);
      expect(calls[0]?.block).toBe(numberToHex(500));
    });

    it('reads tick fee growth outside for a tick', async () => {
      await expect(provider.tickFeeGrowthOutside(500, 100)).resolves.toEqual({
        feeGrowth0: 110n,
        feeGrowth1: 120n,
      });
    });

    it('converts slot0 sqrtPriceX96 to a raw price', async () => {
      await expect(provider.slot0Price('latest')).resolves.toBe(1);
      expect(calls[0]?.block).toBe('latest');
    });

    it('reads token decimals once and caches them', async () => {
      const first = await provider.tokenDecimals();
      const second = await provider.tokenDecimals();

      expect(first).toEqual({ token0Decimals: 6, token1Decimals: 18 });
      expect(second).toBe(first);
      expect(calls.map((c) => c.functionName)).toEqual(['token0', 'token1', 'decimals', 'decimals']);
    });
  });

  describe('error handling', () => {
    it('wraps RPC failures in UpstreamUnavailableError', async () => {
      const failing = createProvider({ failCalls: true }).provider;

      const error = await failing.feeGrowthGlobals(10).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamUnavailableError);
      expect(error).toMatchObject({ code: 'UPSTREAM_UNAVAILABLE', source: 'evm-rpc' });
    });

    it('rejects a malformed pool address', () => {
      const client = createPublicClient({ transport: custom(createFakeNode()) });
      expect(() => new ViemChainStateProvider({ client, poolAddress: '0x1234' })).toThrow();
    });
  });
});
