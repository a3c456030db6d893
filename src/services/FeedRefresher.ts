// FeedRefresher: keeps aggregator-backed feeds current on a fixed interval
import type { Logger } from 'winston';

import type { ChainlinkPriceFeed } from '../collaborators/ChainlinkPriceFeed.js';
import { feedRefreshTotal } from '../metrics/index.js';

export interface FeedRefresherOptions {
  feeds: ChainlinkPriceFeed[];
  intervalMs: number;
  logger: Logger;
}

export interface RefreshSummary {
  refreshed: number;
  failed: number;
}

/**
 * A failed refresh leaves the feed on its previous round; the engine's
 * staleness check then decides whether that round is still usable.
 */
export class FeedRefresher {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<RefreshSummary> | null = null;

  constructor(private readonly options: FeedRefresherOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  async refreshAll(): Promise<RefreshSummary> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = (async () => {
      const results = await Promise.allSettled(this.options.feeds.map(feed => feed.refresh()));
      const summary: RefreshSummary = { refreshed: 0, failed: 0 };

      results.forEach((result, i) => {
        const feed = this.options.feeds[i];
        if (result.status === 'fulfilled') {
          summary.refreshed++;
          feedRefreshTotal.inc({ feed: feed.id, status: 'success' });
          this.options.logger.debug('[feed] refreshed', {
            feed: feed.id,
            price: result.value.price.toString(),
            updatedAt: result.value.updatedAt
          });
        } else {
          summary.failed++;
          feedRefreshTotal.inc({ feed: feed.id, status: 'error' });
          this.options.logger.warn('[feed] refresh failed', {
            feed: feed.id,
            error: result.reason instanceof Error ? result.reason.message : String(result.reason)
          });
        }
      });

      return summary;
    })();

    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  start(): void {
    if (this.timer || this.options.feeds.length === 0) return;

    this.timer = setInterval(() => {
      this.refreshAll().catch(err => {
        this.options.logger.error('[feed] refresh cycle crashed', {
          error: err instanceof Error ? err.message : String(err)
        });
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
