import { InvalidDataError } from '../../../../shared/domain/errors/domain.errors';
import { commercialBookingRow, privateBookingRow } from '../../../../../test/support/booking-rows';
import { BookingMapper } from './booking.mapper';

describe('BookingMapper', () => {
    it('rebuilds a private booking from its row', () => {
        const booking = BookingMapper.toDomain(privateBookingRow({ messages: { driverMessage: 'Hi', hostMessage: null } }));

        expect(booking.id).toBe('booking-private');
        expect(booking.resource).toEqual({ type: 'private', listingId: 'listing-1', slotId: 'A' });
        expect(booking.status).toBe('confirmed');
        expect(booking.pricing.taxAmount).toBe(3.6);
        expect(booking.accessCode.value).toBe('042917');
        expect(booking.messages).toEqual({ driverMessage: 'Hi', hostMessage: null });
    });

    it('accepts timestamps serialised as strings', () => {
        const row = {
            ...commercialBookingRow(),
            requested_at: '2030-01-01T08:00:00.000Z',
            scheduled_start: '2030-01-02T09:00:00.000Z',
            scheduled_end: '2030-01-02T11:00:00.000Z',
        };

        const booking = BookingMapper.toDomain(row);

        expect(booking.timing.scheduledStart).toEqual(new Date('2030-01-02T09:00:00.000Z'));
        expect(booking.vehicle).toEqual({ vehicleNumber: 'TEST-123', vehicleType: 'sedan' });
    });

    it('writes back the columns it reads', () => {
        const row = commercialBookingRow({ status: 'active', actual_start: new Date('2030-01-02T09:05:00.000Z') });

        expect(BookingMapper.toPersistence(BookingMapper.toDomain(row))).toEqual(row);
    });

    it('reports every problem of a malformed row', () => {
        const row = { ...privateBookingRow(), status: 'parked', access_code: '12ab' };

        expect(() => BookingMapper.toDomain(row)).toThrow(InvalidDataError);
        try {
            BookingMapper.toDomain(row);
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidDataError);
            if (error instanceof InvalidDataError) {
                expect(error.code).toBe('INVALID_DATA');
                expect(error.details.id).toBe('booking-private');
                expect(error.details.problems).toEqual([
                    'status: status must be one of the following values: requested, confirmed, active, cancel_requested, cancelled, completed, rejected, no_show',
                    'access_code: access_code must match /^\\d{6}$/ regular expression',
                ]);
            }
        }
    });

    it('refuses rows whose resource columns contradict the type', () => {
        const row = privateBookingRow({ facility_id: 'facility-1' });

        expect(() => BookingMapper.toDomain(row)).toThrow(
            'Malformed booking record booking-private: private booking must not reference a facility',
        );
    });

    it('refuses rows from a newer schema version', () => {
        expect(() => BookingMapper.toDomain(privateBookingRow({ schema_version: 2 }))).toThrow(InvalidDataError);
    });

    it('refuses an impossible schedule', () => {
        const row = privateBookingRow({ scheduled_end: new Date('2030-01-02T08:00:00.000Z') });

        expect(() => BookingMapper.toDomain(row)).toThrow(
            'Malformed booking record booking-private: Scheduled start must be before scheduled end',
        );
    });
});
