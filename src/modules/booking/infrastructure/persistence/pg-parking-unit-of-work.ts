import { Inject, Injectable } from '@nestjs/common';
import { DatabaseClient, TransactionCommitError } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import { PartialFailureError } from '../../../../shared/domain/errors/domain.errors';
import { FacilityRepository } from '../../../facility/infrastructure/persistence/facility.repository';
import { UserProfileRepository } from '../../../identity/infrastructure/persistence/user-profile.repository';
import { ListingRepository } from '../../../listing/infrastructure/persistence/listing.repository';
import { IParkingUnitOfWork, ParkingRepositories } from '../../domain/repositories/parking-unit-of-work.interface';
import { BookingRepository } from './booking.repository';

/**
 * Binds all parking repositories to one PostgreSQL transaction.
 */
@Injectable()
export class PgParkingUnitOfWork implements IParkingUnitOfWork {
    constructor(
        @Inject(DATABASE_CLIENT) private readonly db: DatabaseClient,
    ) { }

    async run<T>(work: (repositories: ParkingRepositories) => Promise<T>): Promise<T> {
        try {
            return await this.db.transaction(client => work({
                bookings: new BookingRepository(client),
                facilities: new FacilityRepository(client),
                listings: new ListingRepository(client),
                profiles: new UserProfileRepository(client),
            }));
        } catch (error) {
            if (error instanceof TransactionCommitError) {
                throw new PartialFailureError(
                    'The change may or may not have been saved; reconciliation will verify it',
                    {},
                    error.cause,
                );
            }
            throw error;
        }
    }
}
