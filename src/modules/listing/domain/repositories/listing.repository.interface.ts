import { PrivateListing } from '../entities/private-listing.entity';
import { SlotState } from '../value-objects/slot-state.vo';

export const LISTING_REPOSITORY = Symbol('LISTING_REPOSITORY');

export interface IListingRepository {
    findById(listingId: string): Promise<PrivateListing | null>;
    /** Throws NotFoundError. */
    get(listingId: string): Promise<PrivateListing>;
    /**
     * Same as `get`, but holds the listing row until the transaction ends so
     * that slot writes and the derived flag of one listing are serialised.
     */
    lock(listingId: string): Promise<PrivateListing>;
    findAll(): Promise<PrivateListing[]>;

    /**
     * Overwrites the slot state. Fails with SlotUnavailableError when the slot
     * is held by a booking other than `expectedHolder` and `next.bookingId`.
     * Writing the state the slot already has is a no-op.
     */
    setState(listingId: string, slotId: string, next: SlotState, expectedHolder: string | null): Promise<void>;
    setActiveBookingFlag(listingId: string, hasActiveBooking: boolean): Promise<void>;
}
