import { Type } from 'class-transformer';
import { IsDate, IsNotEmpty, IsNumber, IsOptional, IsString, IsUUID, MaxLength, Min } from 'class-validator';

export class CreatePrivateBookingDto {
  @IsUUID()
  listingId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  slotId!: string;

  @Type(() => Date)
  @IsDate()
  scheduledStart!: Date;

  @Type(() => Date)
  @IsDate()
  scheduledEnd!: Date;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  agreedRate!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  estimatedCost!: number;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  driverMessage?: string;
}
