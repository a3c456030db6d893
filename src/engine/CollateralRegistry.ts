import type { PriceFeed } from '../collaborators/types.js';
import { normalizeAddress } from '../utils/Address.js';

import { ValidationError } from './errors.js';
import type { CollateralAsset, CollateralAssetConfig } from './types.js';

/**
 * Fixed, ordered set of accepted collateral assets. Built once from the
 * engine configuration; there is no way to add or remove an asset later.
 */
export class CollateralRegistry {
  private readonly ordered: readonly CollateralAsset[];
  private readonly byId: ReadonlyMap<string, CollateralAsset>;

  constructor(configs: readonly CollateralAssetConfig[]) {
    const assets: CollateralAsset[] = [];
    const byId = new Map<string, CollateralAsset>();

    configs.forEach((cfg, index) => {
      const asset = normalizeAddress(cfg.asset);
      if (byId.has(asset)) {
        throw new ValidationError('DuplicateCollateral', `Collateral ${asset} configured twice`, { asset });
      }
      const entry: CollateralAsset = Object.freeze({
        asset,
        token: cfg.token,
        priceFeed: cfg.priceFeed,
        index
      });
      assets.push(entry);
      byId.set(asset, entry);
    });

    this.ordered = Object.freeze(assets);
    this.byId = byId;
  }

  /**
   * Pair parallel asset and feed lists the way a deployment script passes them.
   * Lengths must match.
   */
  static fromParallelLists(
    tokens: ReadonlyArray<CollateralAssetConfig['token']>,
    feeds: readonly PriceFeed[]
  ): CollateralRegistry {
    if (tokens.length !== feeds.length) {
      throw new ValidationError(
        'ConfigLengthMismatch',
        'Token addresses and price feed addresses must be the same length',
        { tokens: tokens.length, feeds: feeds.length }
      );
    }
    return new CollateralRegistry(
      tokens.map((token, i) => ({ asset: token.id, token, priceFeed: feeds[i] }))
    );
  }

  /** Assets in configured order. */
  list(): readonly CollateralAsset[] {
    return this.ordered;
  }

  ids(): string[] {
    return this.ordered.map(a => a.asset);
  }

  get size(): number {
    return this.ordered.length;
  }

  has(asset: string): boolean {
    return this.byId.has(normalizeAddress(asset));
  }

  /** Resolve a registered asset or fail with NotAllowedToken. */
  require(asset: string): CollateralAsset {
    const entry = this.byId.get(normalizeAddress(asset));
    if (!entry) {
      throw new ValidationError('NotAllowedToken', `Token ${asset} is not an allowed collateral`, { asset });
    }
    return entry;
  }
}
