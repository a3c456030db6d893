// Wire a SyntheticEngine from a config file: in-process tokens, manual or aggregator feeds
import { JsonRpcProvider } from 'ethers';

import { ChainlinkPriceFeed } from '../collaborators/ChainlinkPriceFeed.js';
import { InMemoryToken } from '../collaborators/InMemoryToken.js';
import { ManualPriceFeed } from '../collaborators/ManualPriceFeed.js';
import type { PriceFeed } from '../collaborators/types.js';
import { config } from '../config/index.js';
import { SyntheticEngine } from '../engine/SyntheticEngine.js';
import type { EngineLogger } from '../services/EngineLogger.js';
import { toFeedPrice, toWad } from '../utils/decimals.js';

import type { EngineConfigFile, FeedConfig } from './engineConfig.js';

export interface EngineService {
  engine: SyntheticEngine;
  synthetic: InMemoryToken;
  /** Collateral tokens by asset id, in configured order. */
  tokens: Map<string, InMemoryToken>;
  manualFeeds: Map<string, ManualPriceFeed>;
  aggregatorFeeds: ChainlinkPriceFeed[];
}

export interface BuildEngineOptions {
  engineAccount?: string;
  clock?: () => number;
  staleTimeoutSec?: number;
  logger?: EngineLogger;
  /** Required when any feed is an aggregator. */
  rpcUrl?: string;
}

export function buildEngine(file: EngineConfigFile, options: BuildEngineOptions = {}): EngineService {
  const clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
  const rpcUrl = options.rpcUrl ?? config.rpcUrl;
  let provider: JsonRpcProvider | undefined;

  const tokens = new Map<string, InMemoryToken>();
  const manualFeeds = new Map<string, ManualPriceFeed>();
  const aggregatorFeeds: ChainlinkPriceFeed[] = [];

  const makeFeed = (feed: FeedConfig): PriceFeed => {
    if (feed.type === 'manual') {
      const manual = new ManualPriceFeed(feed.id, toFeedPrice(feed.price), clock());
      manualFeeds.set(manual.id, manual);
      return manual;
    }
    if (!rpcUrl) {
      throw new Error(`RPC_URL is required for aggregator feed ${feed.address}`);
    }
    provider ??= new JsonRpcProvider(rpcUrl);
    const aggregator = ChainlinkPriceFeed.fromProvider(feed.address, provider);
    aggregatorFeeds.push(aggregator);
    return aggregator;
  };

  const collateral = file.collateral.map(entry => {
    const token = new InMemoryToken(entry.asset);
    tokens.set(token.id, token);
    return { asset: token.id, token, priceFeed: makeFeed(entry.priceFeed) };
  });

  const synthetic = new InMemoryToken(file.syntheticToken);
  const engine = new SyntheticEngine({
    collateral,
    syntheticToken: synthetic,
    engineAccount: options.engineAccount ?? config.engineAccount,
    clock,
    staleTimeoutSec: options.staleTimeoutSec ?? config.oracleStaleTimeoutSec,
    logger: options.logger
  });

  for (const [asset, holders] of Object.entries(file.balances ?? {})) {
    const token = tokens.get(engine.collateralToken(asset).id);
    if (!token) continue;
    for (const [account, amount] of Object.entries(holders)) {
      token.mint(account, toWad(amount));
    }
  }

  return { engine, synthetic, tokens, manualFeeds, aggregatorFeeds };
}
