// ChainlinkPriceFeed: aggregator-backed feed with a synchronous read side
import { Contract, type Provider } from 'ethers';

import { normalizeAddress } from '../utils/Address.js';
import { scaleFeedAnswer } from '../utils/chainlinkMath.js';

import type { PriceFeed, PriceQuote } from './types.js';

// Chainlink Aggregator V3 Interface ABI (minimal)
export const AGGREGATOR_V3_ABI = [
  'function decimals() external view returns (uint8)',
  'function latestRoundData() external view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)'
];

/**
 * The two aggregator calls the feed needs. Results are untrusted and
 * validated before use.
 */
export interface AggregatorReader {
  decimals(): Promise<unknown>;
  latestRoundData(): Promise<unknown>;
}

export interface RoundData {
  roundId: bigint;
  answer: bigint;
  updatedAt: number;
  answeredInRound: bigint;
}

export function parseRoundData(raw: unknown): RoundData {
  if (!Array.isArray(raw) || raw.length < 5) {
    throw new Error('Malformed latestRoundData result');
  }
  const items: readonly unknown[] = raw;
  const [roundId, answer, , updatedAt, answeredInRound] = items;

  if (
    typeof roundId !== 'bigint' ||
    typeof answer !== 'bigint' ||
    typeof updatedAt !== 'bigint' ||
    typeof answeredInRound !== 'bigint'
  ) {
    throw new Error('Malformed latestRoundData result');
  }

  if (answeredInRound < roundId) {
    throw new Error(`Incomplete round: answeredInRound=${answeredInRound} < roundId=${roundId}`);
  }

  return { roundId, answer, updatedAt: Number(updatedAt), answeredInRound };
}

/**
 * The engine reads prices synchronously, so the network read happens in
 * refresh() and latestQuote() serves the last round fetched. Before the first
 * successful refresh the quote is {price: 0, updatedAt: 0}, which every
 * strict oracle check rejects.
 */
export class ChainlinkPriceFeed implements PriceFeed {
  readonly id: string;
  private quote: PriceQuote = { price: 0n, updatedAt: 0 };
  private decimals: number | null = null;
  private lastRoundId: bigint | null = null;

  constructor(id: string, private readonly aggregator: AggregatorReader) {
    this.id = normalizeAddress(id);
  }

  static fromProvider(address: string, provider: Provider): ChainlinkPriceFeed {
    const contract = new Contract(address, AGGREGATOR_V3_ABI, provider);
    return new ChainlinkPriceFeed(address, {
      decimals: () => contract.getFunction('decimals').staticCall(),
      latestRoundData: () => contract.getFunction('latestRoundData').staticCall()
    });
  }

  latestQuote(): PriceQuote {
    return { ...this.quote };
  }

  get roundId(): bigint | null {
    return this.lastRoundId;
  }

  /**
   * Fetch the latest round. On failure the previous quote stays in place and
   * the error propagates to the caller.
   */
  async refresh(): Promise<PriceQuote> {
    if (this.decimals === null) {
      const raw = await this.aggregator.decimals();
      if (typeof raw !== 'bigint' && typeof raw !== 'number') {
        throw new Error(`Malformed decimals() result from ${this.id}`);
      }
      this.decimals = Number(raw);
    }

    const round = parseRoundData(await this.aggregator.latestRoundData());
    this.quote = {
      price: scaleFeedAnswer(round.answer, this.decimals),
      updatedAt: round.updatedAt
    };
    this.lastRoundId = round.roundId;
    return this.latestQuote();
  }
}
