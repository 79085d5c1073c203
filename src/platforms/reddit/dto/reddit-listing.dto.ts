import {
  Equals,
  IsArray,
  IsBoolean,
  IsDefined,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

/**
 * Wire shapes of the listing endpoint
 * Properties keep Reddit's snake_case names so plainToInstance maps them 1:1.
 * Unknown properties are left alone; known ones are type-checked.
 */

export class ThingDto {
  @IsString()
  kind!: string;

  @IsObject()
  data!: Record<string, unknown>;
}

export class ListingDataDto {
  @IsOptional()
  @IsString()
  after?: string | null;

  @IsOptional()
  @IsString()
  before?: string | null;

  @IsOptional()
  @IsInt()
  dist?: number | null;

  @IsOptional()
  @IsString()
  modhash?: string | null;

  @IsDefined()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ThingDto)
  children!: ThingDto[];
}

export class ListingEnvelopeDto {
  @Equals('Listing')
  kind!: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => ListingDataDto)
  data!: ListingDataDto;
}

/**
 * kind == "t3"
 */
export class LinkDataDto {
  @IsString()
  id!: string;

  @IsString()
  name!: string;

  @IsString()
  title!: string;

  @IsString()
  author!: string;

  @IsString()
  subreddit!: string;

  @IsNumber()
  score!: number;

  @IsNumber()
  created_utc!: number;

  @IsString()
  permalink!: string;

  @IsString()
  url!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  num_comments?: number;

  @IsOptional()
  @IsNumber()
  ups?: number;

  @IsOptional()
  @IsNumber()
  upvote_ratio?: number;

  @IsOptional()
  @IsString()
  domain?: string;

  @IsOptional()
  @IsBoolean()
  is_self?: boolean;

  @IsOptional()
  @IsString()
  selftext?: string;

  @IsOptional()
  @IsString()
  selftext_html?: string | null;

  @IsOptional()
  @IsString()
  thumbnail?: string | null;

  @IsOptional()
  @IsString()
  post_hint?: string | null;

  @IsOptional()
  @IsBoolean()
  over_18?: boolean;

  @IsOptional()
  @IsBoolean()
  spoiler?: boolean;

  @IsOptional()
  @IsBoolean()
  stickied?: boolean;

  @IsOptional()
  @IsBoolean()
  locked?: boolean;

  @IsOptional()
  @IsBoolean()
  is_video?: boolean;

  @IsOptional()
  @IsString()
  link_flair_text?: string | null;

  @IsOptional()
  @IsString()
  author_flair_text?: string | null;

  @IsOptional()
  @IsString()
  distinguished?: string | null;

  // false, true (old posts) or the edit time in epoch seconds
  @ValidateIf(
    (link: LinkDataDto) =>
      link.edited !== undefined &&
      link.edited !== null &&
      typeof link.edited !== 'boolean',
  )
  @IsNumber()
  edited?: boolean | number | null;
}

/**
 * Error body Reddit sends with non-success statuses
 * Example: {"reason": "private", "message": "Forbidden", "error": 403}
 */
export class ApiErrorBodyDto {
  @IsOptional()
  @IsString()
  message?: string;

  @IsOptional()
  @IsString()
  reason?: string;

  @IsOptional()
  @IsInt()
  error?: number;
}
