import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { BlobEncoding } from "@/benchmarks/benchmarks.types";

export class PriceResponseDto {
  @ApiProperty({
    description: "Price as a fixed-point integer string, scaled by 10^expo",
    example: "6734523000000",
  })
  price!: string;

  @ApiProperty({
    description: "Confidence interval as a fixed-point integer string",
    example: "3120000000",
  })
  conf!: string;

  @ApiProperty({ description: "Exponent applied to price and conf", example: -8 })
  expo!: number;

  @ApiProperty({ description: "Unix timestamp of the price, in seconds", example: 1717632000 })
  publish_time!: number;
}

export class PriceFeedMetadataDto {
  @ApiProperty({ type: Number, nullable: true, example: null })
  slot!: number | null;

  @ApiProperty({ type: Number, nullable: true, example: null })
  proof_available_time!: number | null;

  @ApiProperty({ type: Number, nullable: true, example: null })
  prev_publish_time!: number | null;
}

export class ParsedPriceFeedDto {
  @ApiProperty({
    description: "Price feed identifier, 64 lowercase hex digits",
    example: "e62df6c8b4a85fe1a67db44dc12de5db330f7ac66b72dc658afedf0f4a415b43",
  })
  id!: string;

  @ApiProperty({ type: PriceResponseDto })
  price!: PriceResponseDto;

  @ApiProperty({ type: PriceResponseDto })
  ema_price!: PriceResponseDto;

  @ApiProperty({ type: PriceFeedMetadataDto })
  metadata!: PriceFeedMetadataDto;
}

export class BinaryUpdatesDto {
  @ApiProperty({ enum: BlobEncoding, example: BlobEncoding.Hex })
  encoding!: BlobEncoding;

  @ApiProperty({
    description: "Signed update messages in the requested encoding",
    type: [String],
    example: ["504e4155010000..."],
  })
  data!: string[];
}

export class PriceUpdatesResponseDto {
  @ApiProperty({ type: BinaryUpdatesDto })
  binary!: BinaryUpdatesDto;

  @ApiPropertyOptional({ type: [ParsedPriceFeedDto], description: "Omitted when parsed=false" })
  parsed?: ParsedPriceFeedDto[];
}
