import { Type } from 'class-transformer';
import {
  IsInt,
  IsLatitude,
  IsLongitude,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

export class CreateFacilityDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  name!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  address!: string;

  @IsOptional()
  @Type(() => Number)
  @IsLatitude()
  latitude?: number;

  @IsOptional()
  @Type(() => Number)
  @IsLongitude()
  longitude?: number;

  /** e.g. "garage", "open_lot". */
  @IsString()
  @IsNotEmpty()
  @MaxLength(40)
  facilityType!: string;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  defaultHourlyRate!: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  flatDayRate?: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  totalCapacity!: number;
}
