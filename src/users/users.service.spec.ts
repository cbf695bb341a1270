import { Test, TestingModule } from '@nestjs/testing';
import { CustomLoggerService } from '../common/services/logger.service';
import { UserProfile } from '../modules/identity/domain/entities/user-profile.entity';
import type { IUserProfileRepository } from '../modules/identity/domain/repositories/user-profile.repository.interface';
import { USER_PROFILE_REPOSITORY } from '../modules/identity/domain/repositories/user-profile.repository.interface';
import { InvalidDataError, NotAuthenticatedError } from '../shared/domain/errors/domain.errors';
import { createLoggerStub, type LoggerStub } from '../../test/support/parking-testing-module';
import { UsersService } from './users.service';

const profile = UserProfile.reconstitute('driver-1', {
  email: 'driver-1@example.com',
  name: 'Dana Driver',
  phoneNumber: null,
  capabilities: { canDrive: true, canHostPrivate: false, canHostCommercial: false },
  stats: { totalBookingsAsDriver: 2, totalEarnings: 0, hostRating: null },
  createdAt: new Date('2030-01-01T00:00:00.000Z'),
});

describe('UsersService', () => {
  let service: UsersService;
  let logger: LoggerStub;
  let profiles: jest.Mocked<IUserProfileRepository>;

  beforeEach(async () => {
    logger = createLoggerStub();
    profiles = {
      findById: jest.fn(),
      get: jest.fn(),
      incrementDriverBookingCount: jest.fn(),
      addHostEarnings: jest.fn(),
      setCapability: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: USER_PROFILE_REPOSITORY, useValue: profiles },
        { provide: CustomLoggerService, useValue: logger },
      ],
    }).compile();

    service = module.get(UsersService);
  });

  describe('loadSessionProfile', () => {
    it('returns the stored profile', async () => {
      profiles.findById.mockResolvedValue(profile);

      await expect(service.loadSessionProfile('driver-1')).resolves.toBe(profile);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('logs and returns null when there is no profile', async () => {
      profiles.findById.mockResolvedValue(null);

      await expect(service.loadSessionProfile('driver-9')).resolves.toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('No profile for authenticated user', { userId: 'driver-9' });
    });

    it('does not fail the session when the profile cannot be read', async () => {
      const failure = new InvalidDataError('user profile', ['total_earnings is not a number'], 'driver-1');
      profiles.findById.mockRejectedValue(failure);

      await expect(service.loadSessionProfile('driver-1')).resolves.toBeNull();
      expect(logger.logError).toHaveBeenCalledWith(failure, { userId: 'driver-1', stage: 'load_session_profile' });
    });
  });

  describe('updateCapability', () => {
    it('writes the flag and returns the fresh profile', async () => {
      profiles.setCapability.mockResolvedValue(undefined);
      profiles.get.mockResolvedValue(profile);

      await expect(service.updateCapability('driver-1', 'canHostPrivate', true)).resolves.toBe(profile);
      expect(profiles.setCapability).toHaveBeenCalledWith('driver-1', 'canHostPrivate', true);
      expect(logger.logBusinessEvent).toHaveBeenCalledWith('user_capability_changed', {
        userId: 'driver-1',
        capability: 'canHostPrivate',
        enabled: true,
      });
    });

    it('needs a signed-in user', async () => {
      await expect(service.updateCapability(undefined, 'canDrive', false)).rejects.toBeInstanceOf(NotAuthenticatedError);
      expect(profiles.setCapability).not.toHaveBeenCalled();
    });
  });
});
