import type { PriceIdentifier } from "./price-identifier";

/** Seconds since the Unix epoch */
export type UnixTimestamp = number;

export type Slot = number;

/**
 * A price with a degree of uncertainty, both expressed as fixed-point integers
 * scaled by 10^expo.
 */
export interface Price {
  price: bigint;
  conf: bigint;
  expo: number;
  publishTime: UnixTimestamp;
}

export interface PriceFeed {
  id: PriceIdentifier;
  price: Price;
  emaPrice: Price;
}

/**
 * One parsed price feed together with its update metadata.
 * The metadata fields are explicitly undefined while the provider does not supply them.
 */
export interface PriceFeedUpdate {
  priceFeed: PriceFeed;
  slot: Slot | undefined;
  receivedAt: UnixTimestamp | undefined;
  updateData: Buffer | undefined;
  prevPublishTime: UnixTimestamp | undefined;
}

/**
 * A batch of price feed updates and the raw signed update messages proving them.
 * The update messages are kept at batch level, not per feed.
 */
export interface PriceFeedsWithUpdateData {
  priceFeeds: PriceFeedUpdate[];
  updateData: Buffer[];
}

