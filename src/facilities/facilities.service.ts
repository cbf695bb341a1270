import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { CustomLoggerService } from '../common/services/logger.service';
import { requireActor } from '../common/utils/require-actor';
import type { IParkingUnitOfWork } from '../modules/booking/domain/repositories/parking-unit-of-work.interface';
import { PARKING_UNIT_OF_WORK } from '../modules/booking/domain/repositories/parking-unit-of-work.interface';
import { CommercialFacility } from '../modules/facility/domain/entities/commercial-facility.entity';
import type { IFacilityRepository } from '../modules/facility/domain/repositories/facility.repository.interface';
import { FACILITY_REPOSITORY } from '../modules/facility/domain/repositories/facility.repository.interface';
import { FacilityCapacity } from '../modules/facility/domain/value-objects/facility-capacity.vo';
import { InvalidRequestError, NotFoundError, NotPermittedError } from '../shared/domain/errors/domain.errors';

export interface CreateFacilityInput {
  name: string;
  address: string;
  latitude?: number;
  longitude?: number;
  facilityType: string;
  defaultHourlyRate: number;
  flatDayRate?: number;
  totalCapacity: number;
}

@Injectable()
export class FacilitiesService {
  constructor(
    @Inject(PARKING_UNIT_OF_WORK) private readonly unitOfWork: IParkingUnitOfWork,
    @Inject(FACILITY_REPOSITORY) private readonly facilityRepository: IFacilityRepository,
    private readonly logger: CustomLoggerService,
  ) { }

  /** Registers the facility and turns on commercial hosting for its owner. */
  async createFacility(actorId: string | undefined, input: CreateFacilityInput): Promise<CommercialFacility> {
    const ownerId = requireActor(actorId);
    if (!Number.isInteger(input.totalCapacity) || input.totalCapacity < 0) {
      throw new InvalidRequestError('totalCapacity must be a non-negative integer');
    }
    if (input.defaultHourlyRate < 0 || (input.flatDayRate ?? 0) < 0) {
      throw new InvalidRequestError('Rates cannot be negative');
    }

    const facility = CommercialFacility.create({ id: randomUUID(), ownerId, ...input });

    const stored = await this.unitOfWork.run(async repos => {
      await repos.profiles.get(ownerId);
      await repos.facilities.save(facility);
      await repos.profiles.setCapability(ownerId, 'canHostCommercial', true);
      return repos.facilities.get(facility.id);
    });

    this.logger.logBusinessEvent('facility_created', {
      facilityId: stored.id,
      ownerId,
      totalCapacity: stored.capacity.total,
    });
    return stored;
  }

  /** Deleted facilities are not visible. */
  async getFacility(actorId: string | undefined, facilityId: string): Promise<CommercialFacility> {
    requireActor(actorId);
    const facility = await this.facilityRepository.get(facilityId);
    if (facility.isDeleted) {
      throw new NotFoundError('Facility', facilityId);
    }
    return facility;
  }

  async listOwnFacilities(actorId: string | undefined): Promise<CommercialFacility[]> {
    return this.facilityRepository.findByOwner(requireActor(actorId));
  }

  /**
   * Changes the number of spaces. Spaces held by bookings stay held; if the
   * new total is below them, `available` bottoms out at zero.
   */
  async setTotalCapacity(
    actorId: string | undefined,
    facilityId: string,
    totalCapacity: number,
  ): Promise<FacilityCapacity> {
    const ownerId = requireActor(actorId);
    if (!Number.isInteger(totalCapacity) || totalCapacity < 0) {
      throw new InvalidRequestError('totalCapacity must be a non-negative integer');
    }
    await this.getOwned(ownerId, facilityId);

    const capacity = await this.facilityRepository.setTotal(facilityId, totalCapacity);
    this.logger.logBusinessEvent('facility_capacity_changed', {
      facilityId,
      ownerId,
      total: capacity.total,
      available: capacity.available,
    });
    return capacity;
  }

  async setActive(actorId: string | undefined, facilityId: string, isActive: boolean): Promise<CommercialFacility> {
    const ownerId = requireActor(actorId);
    await this.getOwned(ownerId, facilityId);

    await this.facilityRepository.setActive(facilityId, isActive);
    this.logger.logBusinessEvent('facility_active_changed', { facilityId, ownerId, isActive });
    return this.facilityRepository.get(facilityId);
  }

  /** Existing bookings run their course; no new ones are accepted. */
  async deleteFacility(actorId: string | undefined, facilityId: string): Promise<void> {
    const ownerId = requireActor(actorId);
    await this.getOwned(ownerId, facilityId);

    await this.facilityRepository.softDelete(facilityId);
    this.logger.logBusinessEvent('facility_deleted', { facilityId, ownerId });
  }

  private async getOwned(ownerId: string, facilityId: string): Promise<CommercialFacility> {
    const facility = await this.facilityRepository.get(facilityId);
    if (facility.isDeleted) {
      throw new NotFoundError('Facility', facilityId);
    }
    if (facility.ownerId !== ownerId) {
      throw new NotPermittedError('Only the owner can manage this facility', { facilityId });
    }
    return facility;
  }
}
