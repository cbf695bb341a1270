import { Inject, Injectable } from '@nestjs/common';
import { CustomLoggerService } from '../common/services/logger.service';
import { requireActor } from '../common/utils/require-actor';
import { toError } from '../common/utils/to-error';
import type { UserCapability, UserProfile } from '../modules/identity/domain/entities/user-profile.entity';
import type { IUserProfileRepository } from '../modules/identity/domain/repositories/user-profile.repository.interface';
import { USER_PROFILE_REPOSITORY } from '../modules/identity/domain/repositories/user-profile.repository.interface';

@Injectable()
export class UsersService {
  constructor(
    @Inject(USER_PROFILE_REPOSITORY) private readonly profileRepository: IUserProfileRepository,
    private readonly logger: CustomLoggerService,
  ) { }

  async getProfile(actorId: string | undefined): Promise<UserProfile> {
    return this.profileRepository.get(requireActor(actorId));
  }

  /**
   * Profile for an authenticated session. A missing or unreadable profile
   * does not fail the request; it is logged and the session carries none.
   */
  async loadSessionProfile(userId: string): Promise<UserProfile | null> {
    try {
      const profile = await this.profileRepository.findById(userId);
      if (!profile) {
        this.logger.warn('No profile for authenticated user', { userId });
      }
      return profile;
    } catch (error) {
      this.logger.logError(toError(error), { userId, stage: 'load_session_profile' });
      return null;
    }
  }

  async updateCapability(
    actorId: string | undefined,
    capability: UserCapability,
    enabled: boolean,
  ): Promise<UserProfile> {
    const userId = requireActor(actorId);

    await this.profileRepository.setCapability(userId, capability, enabled);
    this.logger.logBusinessEvent('user_capability_changed', { userId, capability, enabled });

    return this.profileRepository.get(userId);
  }
}
