import { Type } from "class-transformer";
import {
  IsArray,
  IsDefined,
  IsEnum,
  IsInt,
  IsObject,
  IsString,
  Matches,
  ValidateNested,
} from "class-validator";
import { BlobEncoding } from "../benchmarks.types";

/**
 * Wire shapes of the provider's JSON reply. Field names follow the provider.
 */

export class PriceDto {
  @IsString()
  @Matches(/^-?\d+$/, { message: "$property must be a decimal integer string" })
  price!: string;

  @IsString()
  @Matches(/^\d+$/, { message: "$property must be a non-negative decimal integer string" })
  conf!: string;

  @IsInt()
  expo!: number;

  @IsInt()
  publish_time!: number;
}

export class PriceFeedDto {
  @IsString()
  @Matches(/^(?:0x)?[0-9a-fA-F]{64}$/, { message: "$property must be a 32-byte hex string" })
  id!: string;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => PriceDto)
  price!: PriceDto;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => PriceDto)
  ema_price!: PriceDto;
}

export class BinaryBlobDto {
  @IsEnum(BlobEncoding)
  encoding!: BlobEncoding;

  @IsArray()
  @IsString({ each: true })
  data!: string[];
}

export class BenchmarkUpdatesDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PriceFeedDto)
  parsed!: PriceFeedDto[];

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => BinaryBlobDto)
  binary!: BinaryBlobDto;
}
