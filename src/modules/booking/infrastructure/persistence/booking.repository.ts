import { Inject, Injectable } from '@nestjs/common';
import { Queryable } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import { NotFoundError, StaleTransitionError } from '../../../../shared/domain/errors/domain.errors';
import { Booking, BookingTransitionFields } from '../../domain/aggregates/booking.aggregate';
import { BookingTransitionPolicy } from '../../domain/policies/booking-transition.policy';
import { IBookingRepository } from '../../domain/repositories/booking.repository.interface';
import { BookingStatus } from '../../domain/value-objects/booking-status';
import { BookingMapper, BookingRow } from './booking.mapper';

const BOOKING_COLUMNS = `
    id, schema_version, booking_type, status, driver_id, host_id,
    listing_id, slot_id, facility_id,
    requested_at, scheduled_start, scheduled_end, actual_start, actual_end,
    approval_time, rejection_reason, access_code, pricing, messages, vehicle`;

@Injectable()
export class BookingRepository implements IBookingRepository {
    constructor(
        @Inject(DATABASE_CLIENT) private readonly db: Queryable,
    ) { }

    async create(booking: Booking): Promise<string> {
        const data = BookingMapper.toPersistence(booking);

        const result = await this.db.query<{ id: string }>(
            `INSERT INTO bookings (
                id, schema_version, booking_type, status, driver_id, host_id,
                listing_id, slot_id, facility_id, scheduled_start, scheduled_end,
                approval_time, access_code, pricing, messages, vehicle
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)
            RETURNING id`,
            [
                data.id,
                data.schema_version,
                data.booking_type,
                data.status,
                data.driver_id,
                data.host_id,
                data.listing_id,
                data.slot_id,
                data.facility_id,
                data.scheduled_start,
                data.scheduled_end,
                data.approval_time,
                data.access_code,
                data.pricing,
                data.messages,
                data.vehicle,
            ],
        );

        return result.rows[0].id;
    }

    async findById(id: string): Promise<Booking | null> {
        const result = await this.db.query<BookingRow>(
            `SELECT ${BOOKING_COLUMNS} FROM bookings WHERE id = $1`,
            [id],
        );

        if (result.rows.length === 0) return null;
        return BookingMapper.toDomain(result.rows[0]);
    }

    async get(id: string): Promise<Booking> {
        const booking = await this.findById(id);
        if (!booking) {
            throw new NotFoundError('Booking', id);
        }
        return booking;
    }

    async updateStatus(
        id: string,
        expected: BookingStatus,
        next: BookingStatus,
        fields: BookingTransitionFields = {},
    ): Promise<void> {
        const result = await this.db.query(
            `UPDATE bookings SET
                status = $3,
                approval_time = COALESCE($4, approval_time),
                rejection_reason = COALESCE($5, rejection_reason),
                actual_start = COALESCE($6, actual_start),
                actual_end = COALESCE($7, actual_end),
                pricing = CASE WHEN $8::numeric IS NULL THEN pricing
                    ELSE jsonb_set(pricing, '{actualCost}', to_jsonb($8::numeric)) END,
                messages = CASE WHEN $9::text IS NULL THEN messages
                    ELSE jsonb_set(messages, '{hostMessage}', to_jsonb($9::text)) END,
                updated_at = now()
            WHERE id = $1 AND status = $2`,
            [
                id,
                expected,
                next,
                fields.approvalTime ?? null,
                fields.rejectionReason ?? null,
                fields.actualStart ?? null,
                fields.actualEnd ?? null,
                fields.actualCost ?? null,
                fields.hostMessage ?? null,
            ],
        );

        if ((result.rowCount ?? 0) > 0) return;

        const current = await this.db.query<{ status: string }>(
            'SELECT status FROM bookings WHERE id = $1',
            [id],
        );
        if (current.rows.length === 0) {
            throw new NotFoundError('Booking', id);
        }
        throw new StaleTransitionError(id, expected, current.rows[0].status);
    }

    async findByDriver(driverId: string): Promise<Booking[]> {
        return this.list('driver_id = $1', [driverId]);
    }

    async findByHost(hostId: string): Promise<Booking[]> {
        return this.list('host_id = $1', [hostId]);
    }

    async findPendingApprovals(hostId: string): Promise<Booking[]> {
        return this.list(`host_id = $1 AND status = 'requested'`, [hostId]);
    }

    async findActiveByDriver(driverId: string): Promise<Booking[]> {
        return this.list(`driver_id = $1 AND status = 'active'`, [driverId]);
    }

    async findHolding(): Promise<Booking[]> {
        return this.list(
            `(booking_type = 'private' AND status = ANY($1::text[]))
                OR (booking_type = 'commercial' AND status = ANY($2::text[]))`,
            [
                BookingTransitionPolicy.holdingStatuses('private'),
                BookingTransitionPolicy.holdingStatuses('commercial'),
            ],
        );
    }

    async countHoldingByFacility(facilityId: string): Promise<number> {
        const result = await this.db.query<{ count: number }>(
            `SELECT COUNT(*)::int AS count FROM bookings
            WHERE facility_id = $1 AND booking_type = 'commercial' AND status = ANY($2::text[])`,
            [facilityId, BookingTransitionPolicy.holdingStatuses('commercial')],
        );

        return result.rows[0]?.count ?? 0;
    }

    async findOverdueConfirmed(cutoff: Date, limit: number): Promise<Booking[]> {
        const result = await this.db.query<BookingRow>(
            `SELECT ${BOOKING_COLUMNS} FROM bookings
            WHERE status = 'confirmed' AND scheduled_start < $1
            ORDER BY scheduled_start ASC
            LIMIT $2`,
            [cutoff, limit],
        );

        return result.rows.map(row => BookingMapper.toDomain(row));
    }

    private async list(condition: string, values: unknown[]): Promise<Booking[]> {
        const result = await this.db.query<BookingRow>(
            `SELECT ${BOOKING_COLUMNS} FROM bookings
            WHERE ${condition}
            ORDER BY requested_at DESC, id DESC`,
            values,
        );

        return result.rows.map(row => BookingMapper.toDomain(row));
    }
}
