import { Logger } from "@nestjs/common";
import type { PriceFeed, PriceFeedUpdate, PriceFeedsWithUpdateData } from "@/types";
import { decodeBinaryBlob } from "./blob-codec";
import type { BenchmarkUpdates } from "./benchmarks.types";

const logger = new Logger("BenchmarkUpdatesAssembler");

function toPriceFeedUpdate(priceFeed: PriceFeed): PriceFeedUpdate {
  // The provider does not report update metadata yet
  return {
    priceFeed,
    slot: undefined,
    receivedAt: undefined,
    updateData: undefined,
    prevPublishTime: undefined,
  };
}

/**
 * Converts a provider reply into the internal update batch.
 *
 * Parsed feeds and binary items are not required to line up one-to-one: a
 * single signed update message may carry many feeds.
 */
export function assembleBenchmarkUpdates(updates: BenchmarkUpdates): PriceFeedsWithUpdateData {
  const updateData = decodeBinaryBlob(updates.binary);

  if (updateData.length !== updates.parsed.length) {
    logger.debug(`Assembling ${updates.parsed.length} parsed feeds with ${updateData.length} update messages`);
  }

  return {
    priceFeeds: updates.parsed.map(toPriceFeedUpdate),
    updateData,
  };
}
