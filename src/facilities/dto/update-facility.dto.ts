import { Type } from 'class-transformer';
import { IsBoolean, IsInt, Min } from 'class-validator';

export class UpdateCapacityDto {
  @Type(() => Number)
  @IsInt()
  @Min(0)
  totalCapacity!: number;
}

export class UpdateFacilityActiveDto {
  @IsBoolean()
  isActive!: boolean;
}
