import { Inject, Injectable } from '@nestjs/common';
import { Queryable } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import { NotFoundError, SlotUnavailableError } from '../../../../shared/domain/errors/domain.errors';
import { PrivateListing } from '../../domain/entities/private-listing.entity';
import { IListingRepository } from '../../domain/repositories/listing.repository.interface';
import { SlotState } from '../../domain/value-objects/slot-state.vo';
import { ListingMapper, ListingRow, SlotRow } from './listing.mapper';

const LISTING_COLUMNS = 'id, host_id, title, auto_accept_bookings, is_active, has_active_booking';
const SLOT_COLUMNS = 'listing_id, slot_id, label, occupied, booking_id, expected_end_time';

@Injectable()
export class ListingRepository implements IListingRepository {
    constructor(
        @Inject(DATABASE_CLIENT) private readonly db: Queryable,
    ) { }

    async findById(listingId: string): Promise<PrivateListing | null> {
        return this.load(listingId, false);
    }

    async get(listingId: string): Promise<PrivateListing> {
        const listing = await this.load(listingId, false);
        if (!listing) {
            throw new NotFoundError('Listing', listingId);
        }
        return listing;
    }

    async lock(listingId: string): Promise<PrivateListing> {
        const listing = await this.load(listingId, true);
        if (!listing) {
            throw new NotFoundError('Listing', listingId);
        }
        return listing;
    }

    async findAll(): Promise<PrivateListing[]> {
        const listings = await this.db.query<ListingRow>(
            `SELECT ${LISTING_COLUMNS} FROM private_listings ORDER BY created_at ASC`,
        );
        const slots = await this.db.query<SlotRow>(
            `SELECT ${SLOT_COLUMNS} FROM listing_slots ORDER BY listing_id, slot_id`,
        );

        const slotsByListing = new Map<string, SlotRow[]>();
        for (const slot of slots.rows) {
            const group = slotsByListing.get(slot.listing_id) ?? [];
            group.push(slot);
            slotsByListing.set(slot.listing_id, group);
        }

        return listings.rows.map(row => ListingMapper.toDomain(row, slotsByListing.get(row.id) ?? []));
    }

    async setState(listingId: string, slotId: string, next: SlotState, expectedHolder: string | null): Promise<void> {
        const result = await this.db.query(
            `UPDATE listing_slots
            SET occupied = $3, booking_id = $4, expected_end_time = $5, updated_at = now()
            WHERE listing_id = $1 AND slot_id = $2
                AND (booking_id IS NULL OR booking_id = $6 OR booking_id = $4)`,
            [listingId, slotId, next.occupied, next.bookingId, next.expectedEndTime, expectedHolder],
        );

        if ((result.rowCount ?? 0) > 0) return;

        const current = await this.db.query<{ booking_id: string | null }>(
            'SELECT booking_id FROM listing_slots WHERE listing_id = $1 AND slot_id = $2',
            [listingId, slotId],
        );
        if (current.rows.length === 0) {
            throw new NotFoundError('Slot', `${listingId}/${slotId}`);
        }
        throw new SlotUnavailableError(listingId, slotId, current.rows[0].booking_id);
    }

    async setActiveBookingFlag(listingId: string, hasActiveBooking: boolean): Promise<void> {
        const result = await this.db.query(
            'UPDATE private_listings SET has_active_booking = $2, updated_at = now() WHERE id = $1',
            [listingId, hasActiveBooking],
        );
        if ((result.rowCount ?? 0) === 0) {
            throw new NotFoundError('Listing', listingId);
        }
    }

    private async load(listingId: string, forUpdate: boolean): Promise<PrivateListing | null> {
        const listing = await this.db.query<ListingRow>(
            `SELECT ${LISTING_COLUMNS} FROM private_listings WHERE id = $1${forUpdate ? ' FOR UPDATE' : ''}`,
            [listingId],
        );
        if (listing.rows.length === 0) return null;

        const slots = await this.db.query<SlotRow>(
            `SELECT ${SLOT_COLUMNS} FROM listing_slots WHERE listing_id = $1 ORDER BY slot_id`,
            [listingId],
        );

        return ListingMapper.toDomain(listing.rows[0], slots.rows);
    }
}
