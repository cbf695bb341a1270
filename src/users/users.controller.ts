import { Body, Controller, Get, Patch } from '@nestjs/common';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { ThrottleManagement } from '../common/decorators/throttle.decorator';
import type { AuthenticatedUser } from '../common/interfaces/authenticated-user.interface';
import { UpdateCapabilityDto } from './dto/update-capability.dto';
import { type UserProfileView, toUserProfileView } from './dto/user-profile-view.dto';
import { UsersService } from './users.service';

@Controller('api/v1/users')
export class UsersController {
  constructor(private readonly usersService: UsersService) { }

  @Get('me')
  async getProfile(@CurrentUser() user: AuthenticatedUser | undefined): Promise<UserProfileView> {
    return toUserProfileView(await this.usersService.getProfile(user?.id));
  }

  @Patch('me/capabilities')
  @ThrottleManagement()
  async updateCapability(
    @CurrentUser() user: AuthenticatedUser | undefined,
    @Body() dto: UpdateCapabilityDto,
  ): Promise<UserProfileView> {
    const profile = await this.usersService.updateCapability(user?.id, dto.capability, dto.enabled);
    return toUserProfileView(profile);
  }
}
