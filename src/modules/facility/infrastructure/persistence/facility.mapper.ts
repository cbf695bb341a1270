import { InvalidDataError } from '../../../../shared/domain/errors/domain.errors';
import { CommercialFacility } from '../../domain/entities/commercial-facility.entity';
import { FacilityCapacity } from '../../domain/value-objects/facility-capacity.vo';

export interface FacilityRow {
    id: string;
    owner_id: string;
    name: string;
    address: string;
    latitude: number | null;
    longitude: number | null;
    facility_type: string;
    default_hourly_rate: string | number;
    flat_day_rate: string | number | null;
    capacity_total: number;
    capacity_available: number;
    is_active: boolean;
    is_deleted: boolean;
    created_at: Date;
}

export class FacilityMapper {
    static toDomain(row: FacilityRow): CommercialFacility {
        let capacity: FacilityCapacity;
        try {
            capacity = FacilityCapacity.create(row.capacity_total, row.capacity_available);
        } catch (error) {
            const problem = error instanceof Error ? error.message : String(error);
            throw new InvalidDataError('facility', [problem], row.id);
        }

        const defaultHourlyRate = Number(row.default_hourly_rate);
        if (!Number.isFinite(defaultHourlyRate)) {
            throw new InvalidDataError('facility', ['default_hourly_rate is not a number'], row.id);
        }

        return CommercialFacility.reconstitute(row.id, {
            ownerId: row.owner_id,
            name: row.name,
            address: row.address,
            latitude: row.latitude,
            longitude: row.longitude,
            facilityType: row.facility_type,
            defaultHourlyRate,
            flatDayRate: row.flat_day_rate === null ? null : Number(row.flat_day_rate),
            capacity,
            isActive: row.is_active,
            isDeleted: row.is_deleted,
            createdAt: row.created_at,
        });
    }

    static toPersistence(facility: CommercialFacility): FacilityRow {
        return {
            id: facility.id,
            owner_id: facility.ownerId,
            name: facility.name,
            address: facility.address,
            latitude: facility.latitude,
            longitude: facility.longitude,
            facility_type: facility.facilityType,
            default_hourly_rate: facility.defaultHourlyRate,
            flat_day_rate: facility.flatDayRate,
            capacity_total: facility.capacity.total,
            capacity_available: facility.capacity.available,
            is_active: facility.isActive,
            is_deleted: facility.isDeleted,
            created_at: facility.createdAt,
        };
    }
}
