import type { UserProfile } from '../../modules/identity/domain/entities/user-profile.entity';

export interface AuthenticatedUser {
  id: string;
  email: string | null;
  /** Null when the profile could not be read for this request. */
  profile: UserProfile | null;
}
