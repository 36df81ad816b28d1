import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

const E164_DIGITS = /^\d{6,15}$/;

export class CardAddressDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  street?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  city?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  region?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  postal_code?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  country?: string;
}

/**
 * One entry of the cards document. `slug` is not stored in the file; it is
 * filled from the key the record was found under.
 */
export class CardRecordDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  slug!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  display_name!: string;

  @ApiPropertyOptional({ description: 'vCard FN; defaults to display_name' })
  @IsOptional()
  @IsString()
  save_as?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  first_name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  last_name?: string;

  @ApiProperty()
  @IsString()
  org!: string;

  @ApiProperty()
  @IsString()
  title!: string;

  @ApiProperty()
  @IsString()
  whatsapp_display!: string;

  @ApiProperty({ description: 'Digits only, country code first' })
  @Matches(E164_DIGITS)
  whatsapp_e164!: string;

  @ApiProperty()
  @IsString()
  office_display!: string;

  @ApiProperty({ description: 'Digits only, country code first' })
  @Matches(E164_DIGITS)
  office_e164!: string;

  @ApiProperty()
  @IsEmail()
  email!: string;

  @ApiProperty()
  @IsString()
  website_display!: string;

  @ApiProperty()
  @IsString()
  website_url!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  address_display?: string;

  @ApiPropertyOptional({ description: 'URL-encoded map search query' })
  @IsOptional()
  @IsString()
  maps_destination?: string;

  @ApiPropertyOptional({ type: CardAddressDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => CardAddressDto)
  address?: CardAddressDto;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  note?: string;

  @ApiPropertyOptional({ description: 'Filename under STATIC_DIR' })
  @IsOptional()
  @IsString()
  photo?: string;

  @ApiPropertyOptional({ description: 'Filename under STATIC_DIR' })
  @IsOptional()
  @IsString()
  logo?: string;
}
