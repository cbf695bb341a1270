import { Inject, Injectable } from '@nestjs/common';
import { Queryable } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import { NoCapacityError, NotFoundError } from '../../../../shared/domain/errors/domain.errors';
import { CommercialFacility } from '../../domain/entities/commercial-facility.entity';
import { IFacilityRepository } from '../../domain/repositories/facility.repository.interface';
import { FacilityCapacity } from '../../domain/value-objects/facility-capacity.vo';
import { FacilityMapper, FacilityRow } from './facility.mapper';

interface CapacityRow {
    capacity_total: number;
    capacity_available: number;
}

const FACILITY_COLUMNS = `
    id, owner_id, name, address, latitude, longitude, facility_type,
    default_hourly_rate, flat_day_rate, capacity_total, capacity_available,
    is_active, is_deleted, created_at`;

@Injectable()
export class FacilityRepository implements IFacilityRepository {
    constructor(
        @Inject(DATABASE_CLIENT) private readonly db: Queryable,
    ) { }

    async save(facility: CommercialFacility): Promise<void> {
        const data = FacilityMapper.toPersistence(facility);

        await this.db.query(
            `INSERT INTO commercial_facilities (
                id, owner_id, name, address, latitude, longitude, facility_type,
                default_hourly_rate, flat_day_rate, capacity_total, capacity_available,
                is_active, is_deleted, created_at
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
            ON CONFLICT (id) DO UPDATE SET
                name = EXCLUDED.name,
                address = EXCLUDED.address,
                latitude = EXCLUDED.latitude,
                longitude = EXCLUDED.longitude,
                facility_type = EXCLUDED.facility_type,
                default_hourly_rate = EXCLUDED.default_hourly_rate,
                flat_day_rate = EXCLUDED.flat_day_rate,
                updated_at = now()`,
            [
                data.id,
                data.owner_id,
                data.name,
                data.address,
                data.latitude,
                data.longitude,
                data.facility_type,
                data.default_hourly_rate,
                data.flat_day_rate,
                data.capacity_total,
                data.capacity_available,
                data.is_active,
                data.is_deleted,
                data.created_at,
            ],
        );
    }

    async findById(id: string): Promise<CommercialFacility | null> {
        const result = await this.db.query<FacilityRow>(
            `SELECT ${FACILITY_COLUMNS} FROM commercial_facilities WHERE id = $1`,
            [id],
        );

        if (result.rows.length === 0) return null;
        return FacilityMapper.toDomain(result.rows[0]);
    }

    async get(id: string): Promise<CommercialFacility> {
        const facility = await this.findById(id);
        if (!facility) {
            throw new NotFoundError('Facility', id);
        }
        return facility;
    }

    async lock(id: string): Promise<CommercialFacility> {
        const result = await this.db.query<FacilityRow>(
            `SELECT ${FACILITY_COLUMNS} FROM commercial_facilities WHERE id = $1 FOR UPDATE`,
            [id],
        );

        if (result.rows.length === 0) {
            throw new NotFoundError('Facility', id);
        }
        return FacilityMapper.toDomain(result.rows[0]);
    }

    async findByOwner(ownerId: string): Promise<CommercialFacility[]> {
        const result = await this.db.query<FacilityRow>(
            `SELECT ${FACILITY_COLUMNS} FROM commercial_facilities
            WHERE owner_id = $1 AND is_deleted = false
            ORDER BY created_at DESC`,
            [ownerId],
        );

        return result.rows.map(row => FacilityMapper.toDomain(row));
    }

    async findAll(): Promise<CommercialFacility[]> {
        const result = await this.db.query<FacilityRow>(
            `SELECT ${FACILITY_COLUMNS} FROM commercial_facilities ORDER BY created_at ASC`,
        );

        return result.rows.map(row => FacilityMapper.toDomain(row));
    }

    async reserve(facilityId: string): Promise<FacilityCapacity> {
        const result = await this.db.query<CapacityRow>(
            `UPDATE commercial_facilities
            SET capacity_available = capacity_available - 1, updated_at = now()
            WHERE id = $1 AND capacity_available > 0
            RETURNING capacity_total, capacity_available`,
            [facilityId],
        );

        if (result.rows.length === 0) {
            await this.assertExists(facilityId);
            throw new NoCapacityError(facilityId);
        }
        return FacilityRepository.toCapacity(result.rows[0]);
    }

    async release(facilityId: string): Promise<FacilityCapacity> {
        const result = await this.db.query<CapacityRow>(
            `UPDATE commercial_facilities
            SET capacity_available = LEAST(capacity_total, capacity_available + 1), updated_at = now()
            WHERE id = $1
            RETURNING capacity_total, capacity_available`,
            [facilityId],
        );

        if (result.rows.length === 0) {
            throw new NotFoundError('Facility', facilityId);
        }
        return FacilityRepository.toCapacity(result.rows[0]);
    }

    async setTotal(facilityId: string, newTotal: number): Promise<FacilityCapacity> {
        // Every SET expression sees the pre-update row.
        const result = await this.db.query<CapacityRow>(
            `UPDATE commercial_facilities
            SET capacity_available = GREATEST(0, $2 - (capacity_total - capacity_available)),
                capacity_total = $2,
                updated_at = now()
            WHERE id = $1
            RETURNING capacity_total, capacity_available`,
            [facilityId, newTotal],
        );

        if (result.rows.length === 0) {
            throw new NotFoundError('Facility', facilityId);
        }
        return FacilityRepository.toCapacity(result.rows[0]);
    }

    async correctAvailable(facilityId: string, observed: number, corrected: number): Promise<boolean> {
        const result = await this.db.query(
            `UPDATE commercial_facilities
            SET capacity_available = $3, updated_at = now()
            WHERE id = $1 AND capacity_available = $2 AND $3 BETWEEN 0 AND capacity_total`,
            [facilityId, observed, corrected],
        );

        return (result.rowCount ?? 0) > 0;
    }

    async setActive(facilityId: string, isActive: boolean): Promise<void> {
        const result = await this.db.query(
            'UPDATE commercial_facilities SET is_active = $2, updated_at = now() WHERE id = $1',
            [facilityId, isActive],
        );
        if ((result.rowCount ?? 0) === 0) {
            throw new NotFoundError('Facility', facilityId);
        }
    }

    async softDelete(facilityId: string): Promise<void> {
        const result = await this.db.query(
            `UPDATE commercial_facilities
            SET is_deleted = true, is_active = false, updated_at = now()
            WHERE id = $1`,
            [facilityId],
        );
        if ((result.rowCount ?? 0) === 0) {
            throw new NotFoundError('Facility', facilityId);
        }
    }

    private async assertExists(facilityId: string): Promise<void> {
        const result = await this.db.query<{ exists: boolean }>(
            'SELECT EXISTS(SELECT 1 FROM commercial_facilities WHERE id = $1) AS exists',
            [facilityId],
        );
        if (!result.rows[0]?.exists) {
            throw new NotFoundError('Facility', facilityId);
        }
    }

    private static toCapacity(row: CapacityRow): FacilityCapacity {
        return FacilityCapacity.create(row.capacity_total, row.capacity_available);
    }
}
