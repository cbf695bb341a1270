import type { IFacilityRepository } from '../../../facility/domain/repositories/facility.repository.interface';
import type { IUserProfileRepository } from '../../../identity/domain/repositories/user-profile.repository.interface';
import type { IListingRepository } from '../../../listing/domain/repositories/listing.repository.interface';
import type { IBookingRepository } from './booking.repository.interface';

export const PARKING_UNIT_OF_WORK = Symbol('PARKING_UNIT_OF_WORK');

/** Repositories bound to one transaction. */
export interface ParkingRepositories {
    readonly bookings: IBookingRepository;
    readonly facilities: IFacilityRepository;
    readonly listings: IListingRepository;
    readonly profiles: IUserProfileRepository;
}

/**
 * Runs `work` atomically: everything it writes through the given repositories
 * is applied together or not at all. When the outcome cannot be known the run
 * fails with PartialFailureError.
 */
export interface IParkingUnitOfWork {
    run<T>(work: (repositories: ParkingRepositories) => Promise<T>): Promise<T>;
}
