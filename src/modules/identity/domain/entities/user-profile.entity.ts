import { Entity } from '../../../../shared/domain/base/entity.base';

export const USER_CAPABILITIES = ['canDrive', 'canHostPrivate', 'canHostCommercial'] as const;
export type UserCapability = (typeof USER_CAPABILITIES)[number];

export type UserCapabilities = Record<UserCapability, boolean>;

export interface UserStats {
    totalBookingsAsDriver: number;
    totalEarnings: number;
    hostRating: number | null;
}

export interface UserProfileProps {
    email: string;
    name: string;
    phoneNumber: string | null;
    capabilities: UserCapabilities;
    stats: UserStats;
    createdAt: Date;
}

export class UserProfile extends Entity<UserProfileProps> {
    static readonly DEFAULT_CAPABILITIES: Readonly<UserCapabilities> = {
        canDrive: true,
        canHostPrivate: false,
        canHostCommercial: false,
    };

    private constructor(id: string, props: UserProfileProps) {
        super(id, props);
    }

    get email(): string { return this.props.email; }
    get name(): string { return this.props.name; }
    get phoneNumber(): string | null { return this.props.phoneNumber; }
    get capabilities(): Readonly<UserCapabilities> { return this.props.capabilities; }
    get stats(): Readonly<UserStats> { return this.props.stats; }
    get createdAt(): Date { return this.props.createdAt; }

    can(capability: UserCapability): boolean {
        return this.props.capabilities[capability];
    }

    static reconstitute(id: string, props: UserProfileProps): UserProfile {
        return new UserProfile(id, props);
    }
}
