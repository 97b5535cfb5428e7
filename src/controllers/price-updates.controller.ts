import {
  BadRequestException,
  Controller,
  DefaultValuePipe,
  Get,
  Header,
  Inject,
  Logger,
  Param,
  ParseBoolPipe,
  ParseEnumPipe,
  ParseIntPipe,
  Query,
} from "@nestjs/common";
import { ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from "@nestjs/swagger";
import { encodeBinaryBlob } from "@/benchmarks/blob-codec";
import { BENCHMARKS_PROVIDER, BlobEncoding, type IBenchmarksProvider } from "@/benchmarks/benchmarks.types";
import { InvalidPriceIdentifierError, PriceIdentifier } from "@/types/price-identifier";
import type { Price, PriceFeedUpdate } from "@/types/price-feed.types";
import { ParsedPriceFeedDto, PriceResponseDto, PriceUpdatesResponseDto } from "./dto/price-updates.dto";

function toPriceResponse(price: Price): PriceResponseDto {
  return {
    price: price.price.toString(),
    conf: price.conf.toString(),
    expo: price.expo,
    publish_time: price.publishTime,
  };
}

function toParsedPriceFeed(update: PriceFeedUpdate): ParsedPriceFeedDto {
  const { priceFeed } = update;
  return {
    id: priceFeed.id.toHex(),
    price: toPriceResponse(priceFeed.price),
    ema_price: toPriceResponse(priceFeed.emaPrice),
    metadata: {
      slot: update.slot ?? null,
      proof_available_time: update.receivedAt ?? null,
      prev_publish_time: update.prevPublishTime ?? null,
    },
  };
}

/**
 * Publish times are whole seconds since the epoch; earlier instants have no updates
 */
export function assertPublishTime(publishTime: number): void {
  if (!Number.isSafeInteger(publishTime) || publishTime < 0) {
    throw new BadRequestException(`Publish time must be a non-negative integer Unix timestamp, got ${publishTime}`);
  }
}

/**
 * Accepts `ids=a&ids=b` as well as `ids[]=a&ids[]=b`
 */
export function parsePriceIdentifiers(ids: unknown): PriceIdentifier[] {
  const values: unknown[] = ids === undefined ? [] : Array.isArray(ids) ? ids : [ids];

  return values.map(value => {
    if (typeof value !== "string") {
      throw new BadRequestException("Each price identifier must be a string");
    }
    try {
      return PriceIdentifier.fromHex(value);
    } catch (error) {
      if (error instanceof InvalidPriceIdentifierError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  });
}

@ApiTags("Historical Price Updates")
@Controller("v1/updates/price")
export class PriceUpdatesController {
  private readonly logger = new Logger(PriceUpdatesController.name);

  constructor(@Inject(BENCHMARKS_PROVIDER) private readonly benchmarks: IBenchmarksProvider) {}

  @Get(":publishTime")
  @Header("Cache-Control", "no-store")
  @ApiOperation({
    summary: "Get verified price updates at a publish time",
    description: "Fetches the signed price updates for the given feeds from the benchmarks provider",
  })
  @ApiParam({ name: "publishTime", description: "Unix timestamp in seconds", example: 1717632000 })
  @ApiQuery({ name: "ids", type: [String], required: false, description: "Price feed identifiers (hex)" })
  @ApiQuery({ name: "encoding", enum: BlobEncoding, required: false })
  @ApiQuery({ name: "parsed", type: Boolean, required: false })
  @ApiResponse({ status: 200, type: PriceUpdatesResponseDto })
  @ApiResponse({ status: 400, description: "Publish time out of range, invalid identifier or query parameter" })
  @ApiResponse({ status: 502, description: "Provider failed or returned malformed data" })
  @ApiResponse({ status: 503, description: "Benchmarks endpoint is not configured" })
  @ApiResponse({ status: 504, description: "Provider request timed out" })
  async getPriceUpdates(
    @Param("publishTime", ParseIntPipe) publishTime: number,
    @Query("ids") ids: unknown,
    @Query("encoding", new DefaultValuePipe(BlobEncoding.Hex), new ParseEnumPipe(BlobEncoding))
    encoding: BlobEncoding,
    @Query("parsed", new DefaultValuePipe(true), ParseBoolPipe) parsed: boolean
  ): Promise<PriceUpdatesResponseDto> {
    assertPublishTime(publishTime);
    const priceIds = parsePriceIdentifiers(ids);
    const result = await this.benchmarks.getVerifiedPriceFeeds(priceIds, publishTime);

    this.logger.debug(`Serving ${result.priceFeeds.length} price feeds for publish time ${publishTime}`);

    return {
      binary: encodeBinaryBlob(result.updateData, encoding),
      parsed: parsed ? result.priceFeeds.map(toParsedPriceFeed) : undefined,
    };
  }
}
