import { InvalidDataError } from '../../../../shared/domain/errors/domain.errors';
import { ListingSlot, PrivateListing } from '../../domain/entities/private-listing.entity';
import { SlotState } from '../../domain/value-objects/slot-state.vo';

export interface ListingRow {
    id: string;
    host_id: string;
    title: string;
    auto_accept_bookings: boolean;
    is_active: boolean;
    has_active_booking: boolean;
}

export interface SlotRow {
    listing_id: string;
    slot_id: string;
    label: string;
    occupied: boolean;
    booking_id: string | null;
    expected_end_time: Date | null;
}

export class ListingMapper {
    static toDomain(row: ListingRow, slotRows: SlotRow[]): PrivateListing {
        return PrivateListing.reconstitute(row.id, {
            hostId: row.host_id,
            title: row.title,
            autoAcceptBookings: row.auto_accept_bookings,
            isActive: row.is_active,
            hasActiveBooking: row.has_active_booking,
            slots: slotRows.map(slotRow => ListingMapper.toSlot(slotRow)),
        });
    }

    static toSlot(row: SlotRow): ListingSlot {
        let state: SlotState;
        try {
            state = SlotState.create({
                occupied: row.occupied,
                bookingId: row.booking_id,
                expectedEndTime: row.expected_end_time,
            });
        } catch (error) {
            const problem = error instanceof Error ? error.message : String(error);
            throw new InvalidDataError('slot', [problem], `${row.listing_id}/${row.slot_id}`);
        }

        return { slotId: row.slot_id, label: row.label, state };
    }
}
