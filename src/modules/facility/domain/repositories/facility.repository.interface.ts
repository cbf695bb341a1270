import { CommercialFacility } from '../entities/commercial-facility.entity';
import { FacilityCapacity } from '../value-objects/facility-capacity.vo';

export const FACILITY_REPOSITORY = Symbol('FACILITY_REPOSITORY');

/**
 * Facility catalog plus the capacity counters. `reserve` and `release` are
 * single atomic read-modify-writes on one facility row.
 */
export interface IFacilityRepository {
    save(facility: CommercialFacility): Promise<void>;
    findById(id: string): Promise<CommercialFacility | null>;
    /** Throws NotFoundError. */
    get(id: string): Promise<CommercialFacility>;
    /**
     * Reads the facility and holds its row lock until the unit of work ends,
     * so capacity cannot move while the caller looks at it. Throws NotFoundError.
     */
    lock(id: string): Promise<CommercialFacility>;
    findByOwner(ownerId: string): Promise<CommercialFacility[]>;
    findAll(): Promise<CommercialFacility[]>;

    /** Takes one space or throws NoCapacityError. */
    reserve(facilityId: string): Promise<FacilityCapacity>;
    /** Returns one space, capped at the total. */
    release(facilityId: string): Promise<FacilityCapacity>;
    setTotal(facilityId: string, newTotal: number): Promise<FacilityCapacity>;
    /**
     * Overwrites `available` only while it still equals `observed`.
     * Returns false when someone moved the counter in between.
     */
    correctAvailable(facilityId: string, observed: number, corrected: number): Promise<boolean>;

    setActive(facilityId: string, isActive: boolean): Promise<void>;
    softDelete(facilityId: string): Promise<void>;
}
