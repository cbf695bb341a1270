import { IsBoolean, IsIn } from 'class-validator';
import { USER_CAPABILITIES, type UserCapability } from '../../modules/identity/domain/entities/user-profile.entity';

export class UpdateCapabilityDto {
  @IsIn(USER_CAPABILITIES)
  capability!: UserCapability;

  @IsBoolean()
  enabled!: boolean;
}
