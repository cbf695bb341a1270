import { InvalidDataError } from '../../../../shared/domain/errors/domain.errors';
import { UserProfile } from '../../domain/entities/user-profile.entity';

export interface UserProfileRow {
    id: string;
    email: string;
    name: string;
    phone_number: string | null;
    can_drive: boolean;
    can_host_private: boolean;
    can_host_commercial: boolean;
    total_bookings_as_driver: number;
    total_earnings: string | number;
    host_rating: string | number | null;
    created_at: Date;
}

export class UserProfileMapper {
    static toDomain(row: UserProfileRow): UserProfile {
        const totalEarnings = Number(row.total_earnings);
        if (!Number.isFinite(totalEarnings)) {
            throw new InvalidDataError('user profile', ['total_earnings is not a number'], row.id);
        }

        return UserProfile.reconstitute(row.id, {
            email: row.email,
            name: row.name,
            phoneNumber: row.phone_number,
            capabilities: {
                canDrive: row.can_drive,
                canHostPrivate: row.can_host_private,
                canHostCommercial: row.can_host_commercial,
            },
            stats: {
                totalBookingsAsDriver: row.total_bookings_as_driver,
                totalEarnings,
                hostRating: row.host_rating === null ? null : Number(row.host_rating),
            },
            createdAt: row.created_at,
        });
    }
}
