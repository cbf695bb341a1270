import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { InvalidDataError } from '../../../../shared/domain/errors/domain.errors';
import { Booking, BookingResource } from '../../domain/aggregates/booking.aggregate';
import { AccessCode } from '../../domain/value-objects/access-code.vo';
import { BookingPricing } from '../../domain/value-objects/booking-pricing.vo';
import { BookingStatus, BookingType } from '../../domain/value-objects/booking-status';
import { BookingTiming } from '../../domain/value-objects/booking-timing.vo';
import { BookingRecord, CURRENT_BOOKING_SCHEMA_VERSION } from './booking-record.schema';

export interface BookingRow {
    id: string;
    schema_version: number;
    booking_type: BookingType;
    status: BookingStatus;
    driver_id: string;
    host_id: string;
    listing_id: string | null;
    slot_id: string | null;
    facility_id: string | null;
    requested_at: Date;
    scheduled_start: Date;
    scheduled_end: Date;
    actual_start: Date | null;
    actual_end: Date | null;
    approval_time: Date | null;
    rejection_reason: string | null;
    access_code: string;
    pricing: {
        rate: number;
        estimatedCost: number;
        actualCost: number | null;
        taxAmount: number | null;
        estimatedDuration: number | null;
    };
    messages: { driverMessage: string | null; hostMessage: string | null };
    vehicle: { vehicleNumber: string | null; vehicleType: string | null } | null;
}

export class BookingMapper {
    /**
     * Validates a stored row and rebuilds the aggregate. Anything that does not
     * match the record schema is reported as InvalidDataError.
     */
    static toDomain(row: unknown): Booking {
        const record = plainToInstance(BookingRecord, row);
        const errors = validateSync(record);
        const problems = errors.flatMap(error => BookingMapper.describe(error));
        problems.push(...BookingMapper.resourceProblems(record));

        if (problems.length > 0) {
            const id = typeof record.id === 'string' ? record.id : undefined;
            throw new InvalidDataError('booking', problems, id);
        }

        try {
            return Booking.reconstitute(record.id, {
                resource: BookingMapper.toResource(record),
                driverId: record.driver_id,
                hostId: record.host_id,
                status: record.status,
                timing: BookingTiming.create({
                    requestedAt: record.requested_at,
                    scheduledStart: record.scheduled_start,
                    scheduledEnd: record.scheduled_end,
                    actualStart: record.actual_start ?? null,
                    actualEnd: record.actual_end ?? null,
                }),
                pricing: BookingPricing.create({
                    rate: record.pricing.rate,
                    estimatedCost: record.pricing.estimatedCost,
                    actualCost: record.pricing.actualCost ?? null,
                    taxAmount: record.pricing.taxAmount ?? null,
                    estimatedDuration: record.pricing.estimatedDuration ?? null,
                }),
                accessCode: AccessCode.create(record.access_code),
                approvalTime: record.approval_time ?? null,
                rejectionReason: record.rejection_reason ?? null,
                messages: {
                    driverMessage: record.messages.driverMessage ?? null,
                    hostMessage: record.messages.hostMessage ?? null,
                },
                vehicle: record.vehicle
                    ? {
                        vehicleNumber: record.vehicle.vehicleNumber ?? null,
                        vehicleType: record.vehicle.vehicleType ?? null,
                    }
                    : null,
            });
        } catch (error) {
            const problem = error instanceof Error ? error.message : String(error);
            throw new InvalidDataError('booking', [problem], record.id);
        }
    }

    static toPersistence(booking: Booking): BookingRow {
        const resource = booking.resource;

        return {
            id: booking.id,
            schema_version: CURRENT_BOOKING_SCHEMA_VERSION,
            booking_type: booking.type,
            status: booking.status,
            driver_id: booking.driverId,
            host_id: booking.hostId,
            listing_id: resource.type === 'private' ? resource.listingId : null,
            slot_id: resource.type === 'private' ? resource.slotId : null,
            facility_id: resource.type === 'commercial' ? resource.facilityId : null,
            requested_at: booking.timing.requestedAt,
            scheduled_start: booking.timing.scheduledStart,
            scheduled_end: booking.timing.scheduledEnd,
            actual_start: booking.timing.actualStart,
            actual_end: booking.timing.actualEnd,
            approval_time: booking.approvalTime,
            rejection_reason: booking.rejectionReason,
            access_code: booking.accessCode.value,
            pricing: {
                rate: booking.pricing.rate,
                estimatedCost: booking.pricing.estimatedCost,
                actualCost: booking.pricing.actualCost,
                taxAmount: booking.pricing.taxAmount,
                estimatedDuration: booking.pricing.estimatedDuration,
            },
            messages: {
                driverMessage: booking.messages.driverMessage,
                hostMessage: booking.messages.hostMessage,
            },
            vehicle: booking.vehicle
                ? { vehicleNumber: booking.vehicle.vehicleNumber, vehicleType: booking.vehicle.vehicleType }
                : null,
        };
    }

    private static toResource(record: BookingRecord): BookingResource {
        if (record.booking_type === 'private' && record.listing_id && record.slot_id) {
            return { type: 'private', listingId: record.listing_id, slotId: record.slot_id };
        }
        if (record.booking_type === 'commercial' && record.facility_id) {
            return { type: 'commercial', facilityId: record.facility_id };
        }
        throw new Error('resource columns do not match booking_type');
    }

    private static resourceProblems(record: BookingRecord): string[] {
        const problems: string[] = [];
        if (record.booking_type === 'private' && record.facility_id) {
            problems.push('private booking must not reference a facility');
        }
        if (record.booking_type === 'commercial' && (record.listing_id || record.slot_id)) {
            problems.push('commercial booking must not reference a listing slot');
        }
        return problems;
    }

    private static describe(error: ValidationError, parent?: string): string[] {
        const path = parent ? `${parent}.${error.property}` : error.property;
        const own = Object.values(error.constraints ?? {}).map(message => `${path}: ${message}`);
        const nested = (error.children ?? []).flatMap(child => BookingMapper.describe(child, path));
        return [...own, ...nested];
    }
}
