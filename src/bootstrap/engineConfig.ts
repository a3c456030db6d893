import fs from 'fs';

import { z } from 'zod';

const decimalString = z.string().regex(/^\d+(\.\d+)?$/, 'expected a non-negative decimal string');

const manualFeedSchema = z.object({
  type: z.literal('manual'),
  id: z.string().min(1),
  /** USD price, human decimal ("2000.5") */
  price: decimalString
});

const chainlinkFeedSchema = z.object({
  type: z.literal('chainlink'),
  address: z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected an aggregator address')
});

export const engineConfigSchema = z.object({
  syntheticToken: z.string().min(1),
  collateral: z.array(z.object({
    asset: z.string().min(1),
    priceFeed: z.discriminatedUnion('type', [manualFeedSchema, chainlinkFeedSchema])
  })).min(1, 'at least one collateral asset is required'),
  /** Opening balances of the in-process collateral tokens: asset → account → human amount */
  balances: z.record(z.record(decimalString)).optional()
});

export type EngineConfigFile = z.infer<typeof engineConfigSchema>;
export type FeedConfig = EngineConfigFile['collateral'][number]['priceFeed'];

export function loadEngineConfig(path: string): EngineConfigFile {
  const raw: unknown = JSON.parse(fs.readFileSync(path, 'utf8'));
  return engineConfigSchema.parse(raw);
}
