import { UserCapability, UserProfile } from '../entities/user-profile.entity';

export const USER_PROFILE_REPOSITORY = Symbol('USER_PROFILE_REPOSITORY');

export interface IUserProfileRepository {
    findById(userId: string): Promise<UserProfile | null>;
    /** Throws NotFoundError. */
    get(userId: string): Promise<UserProfile>;
    incrementDriverBookingCount(userId: string): Promise<void>;
    addHostEarnings(userId: string, amount: number): Promise<void>;
    setCapability(userId: string, capability: UserCapability, enabled: boolean): Promise<void>;
}
