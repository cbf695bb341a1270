import { Type } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsOptional, IsString, Matches, MaxLength, Min } from 'class-validator';

export class ApproveBookingDto {
  @IsOptional()
  @IsString()
  @MaxLength(500)
  hostMessage?: string;
}

export class RejectBookingDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  reason!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  hostMessage?: string;
}

export class EndSessionDto {
  /** Final charge; defaults to the estimate. */
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  actualCost?: number;
}

export class VerifyAccessCodeDto {
  @IsString()
  @Matches(/^\d{6}$/, { message: 'code must be six digits' })
  code!: string;
}
