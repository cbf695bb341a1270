import { Inject, Injectable } from '@nestjs/common';
import { Queryable } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import { NotFoundError } from '../../../../shared/domain/errors/domain.errors';
import { UserCapability, UserProfile } from '../../domain/entities/user-profile.entity';
import { IUserProfileRepository } from '../../domain/repositories/user-profile.repository.interface';
import { UserProfileMapper, UserProfileRow } from './user-profile.mapper';

const CAPABILITY_COLUMNS: Record<UserCapability, string> = {
    canDrive: 'can_drive',
    canHostPrivate: 'can_host_private',
    canHostCommercial: 'can_host_commercial',
};

@Injectable()
export class UserProfileRepository implements IUserProfileRepository {
    constructor(
        @Inject(DATABASE_CLIENT) private readonly db: Queryable,
    ) { }

    async findById(userId: string): Promise<UserProfile | null> {
        const result = await this.db.query<UserProfileRow>(
            `SELECT id, email, name, phone_number, can_drive, can_host_private, can_host_commercial,
                total_bookings_as_driver, total_earnings, host_rating, created_at
            FROM user_profiles WHERE id = $1`,
            [userId],
        );

        if (result.rows.length === 0) return null;
        return UserProfileMapper.toDomain(result.rows[0]);
    }

    async get(userId: string): Promise<UserProfile> {
        const profile = await this.findById(userId);
        if (!profile) {
            throw new NotFoundError('User', userId);
        }
        return profile;
    }

    async incrementDriverBookingCount(userId: string): Promise<void> {
        await this.updateOne(
            userId,
            'UPDATE user_profiles SET total_bookings_as_driver = total_bookings_as_driver + 1, updated_at = now() WHERE id = $1',
            [userId],
        );
    }

    async addHostEarnings(userId: string, amount: number): Promise<void> {
        await this.updateOne(
            userId,
            'UPDATE user_profiles SET total_earnings = total_earnings + $2, updated_at = now() WHERE id = $1',
            [userId, amount],
        );
    }

    async setCapability(userId: string, capability: UserCapability, enabled: boolean): Promise<void> {
        const column = CAPABILITY_COLUMNS[capability];
        await this.updateOne(
            userId,
            `UPDATE user_profiles SET ${column} = $2, updated_at = now() WHERE id = $1`,
            [userId, enabled],
        );
    }

    private async updateOne(userId: string, statement: string, values: unknown[]): Promise<void> {
        const result = await this.db.query(statement, values);
        if ((result.rowCount ?? 0) === 0) {
            throw new NotFoundError('User', userId);
        }
    }
}
