import { Type } from 'class-transformer';
import {
    IsDate,
    IsIn,
    IsInt,
    IsNotEmpty,
    IsNumber,
    IsObject,
    IsOptional,
    IsString,
    Matches,
    Max,
    Min,
    ValidateIf,
    ValidateNested,
} from 'class-validator';
import { BOOKING_STATUSES, BOOKING_TYPES, BookingStatus, BookingType } from '../../domain/value-objects/booking-status';

export const CURRENT_BOOKING_SCHEMA_VERSION = 1;

export class PricingRecord {
    @IsNumber()
    @Min(0)
    rate!: number;

    @IsNumber()
    @Min(0)
    estimatedCost!: number;

    @IsOptional()
    @IsNumber()
    @Min(0)
    actualCost?: number | null;

    @IsOptional()
    @IsNumber()
    @Min(0)
    taxAmount?: number | null;

    @IsOptional()
    @IsNumber()
    @Min(0)
    estimatedDuration?: number | null;
}

export class MessagesRecord {
    @IsOptional()
    @IsString()
    driverMessage?: string | null;

    @IsOptional()
    @IsString()
    hostMessage?: string | null;
}

export class VehicleRecord {
    @IsOptional()
    @IsString()
    vehicleNumber?: string | null;

    @IsOptional()
    @IsString()
    vehicleType?: string | null;
}

/**
 * Shape of a `bookings` row as written by schema version 1. Rows are checked
 * against it before they become aggregates.
 */
export class BookingRecord {
    @IsString()
    @IsNotEmpty()
    id!: string;

    @IsInt()
    @Min(1)
    @Max(CURRENT_BOOKING_SCHEMA_VERSION)
    schema_version!: number;

    @IsIn(BOOKING_TYPES)
    booking_type!: BookingType;

    @IsIn(BOOKING_STATUSES)
    status!: BookingStatus;

    @IsString()
    @IsNotEmpty()
    driver_id!: string;

    @IsString()
    @IsNotEmpty()
    host_id!: string;

    @ValidateIf((record: BookingRecord) => record.booking_type === 'private')
    @IsString()
    @IsNotEmpty()
    listing_id!: string | null;

    @ValidateIf((record: BookingRecord) => record.booking_type === 'private')
    @IsString()
    @IsNotEmpty()
    slot_id!: string | null;

    @ValidateIf((record: BookingRecord) => record.booking_type === 'commercial')
    @IsString()
    @IsNotEmpty()
    facility_id!: string | null;

    @Type(() => Date)
    @IsDate()
    requested_at!: Date;

    @Type(() => Date)
    @IsDate()
    scheduled_start!: Date;

    @Type(() => Date)
    @IsDate()
    scheduled_end!: Date;

    @IsOptional()
    @Type(() => Date)
    @IsDate()
    actual_start!: Date | null;

    @IsOptional()
    @Type(() => Date)
    @IsDate()
    actual_end!: Date | null;

    @IsOptional()
    @Type(() => Date)
    @IsDate()
    approval_time!: Date | null;

    @IsOptional()
    @IsString()
    rejection_reason!: string | null;

    @Matches(/^\d{6}$/)
    access_code!: string;

    @IsObject()
    @ValidateNested()
    @Type(() => PricingRecord)
    pricing!: PricingRecord;

    @IsObject()
    @ValidateNested()
    @Type(() => MessagesRecord)
    messages!: MessagesRecord;

    @IsOptional()
    @ValidateNested()
    @Type(() => VehicleRecord)
    vehicle!: VehicleRecord | null;
}
