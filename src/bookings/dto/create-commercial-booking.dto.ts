import { Type } from 'class-transformer';
import { IsDate, IsNumber, IsOptional, IsPositive, IsString, IsUUID, MaxLength, Min } from 'class-validator';

export class CreateCommercialBookingDto {
  @IsUUID()
  facilityId!: string;

  @Type(() => Date)
  @IsDate()
  scheduledStart!: Date;

  @Type(() => Date)
  @IsDate()
  scheduledEnd!: Date;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  hourlyRate!: number;

  /** Hours. */
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  estimatedDuration!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  estimatedCost!: number;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  vehicleNumber?: string;

  @IsOptional()
  @IsString()
  @MaxLength(40)
  vehicleType?: string;
}
