import { DecimalNormalizer } from "./decimal-normalizer";
import { InvalidFeedValueError } from "./errors";
import { PriceFeed } from "./types";

export interface NormalizedRound {
  // 18 decimals
  readonly price: bigint;
  // Unix seconds, as reported by the feed
  readonly updatedAt: bigint;
}

/**
 * Reads feeds and lifts their answers to 18 decimals
 *
 * Feed decimals are not re-read: the scalar cached at registration is used.
 * There is no staleness check on `updatedAt`, the feed is trusted to be live.
 */
export class PriceFeedReader {
  constructor(private readonly normalizer: DecimalNormalizer) {}

  /**
   * @param feed - The price feed
   * @returns The latest price with 18 decimals
   */
  async latestPrice(feed: PriceFeed): Promise<bigint> {
    const { price } = await this.latestRound(feed);
    return price;
  }

  /**
   * @param feed - The price feed
   * @returns The latest price with 18 decimals and its update time
   */
  async latestRound(feed: PriceFeed): Promise<NormalizedRound> {
    const { answer, updatedAt } = await feed.latestRoundData();

    if (answer < 0n) {
      throw new InvalidFeedValueError(feed.address, answer);
    }

    return {
      price: this.normalizer.normalize(feed.address, answer),
      updatedAt,
    };
  }
}
