import type {
  UserCapabilities,
  UserProfile,
  UserStats,
} from '../../modules/identity/domain/entities/user-profile.entity';

export interface UserProfileView {
  id: string;
  email: string;
  name: string;
  phoneNumber: string | null;
  capabilities: UserCapabilities;
  stats: UserStats;
  createdAt: string;
}

export function toUserProfileView(profile: UserProfile): UserProfileView {
  return {
    id: profile.id,
    email: profile.email,
    name: profile.name,
    phoneNumber: profile.phoneNumber,
    capabilities: { ...profile.capabilities },
    stats: { ...profile.stats },
    createdAt: profile.createdAt.toISOString(),
  };
}
