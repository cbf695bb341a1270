import { Inject, Injectable } from '@nestjs/common';
import { CustomLoggerService } from '../common/services/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import type { Booking } from '../modules/booking/domain/aggregates/booking.aggregate';
import type { IBookingRepository } from '../modules/booking/domain/repositories/booking.repository.interface';
import { BOOKING_REPOSITORY } from '../modules/booking/domain/repositories/booking.repository.interface';
import type { IParkingUnitOfWork } from '../modules/booking/domain/repositories/parking-unit-of-work.interface';
import { PARKING_UNIT_OF_WORK } from '../modules/booking/domain/repositories/parking-unit-of-work.interface';
import type { IFacilityRepository } from '../modules/facility/domain/repositories/facility.repository.interface';
import { FACILITY_REPOSITORY } from '../modules/facility/domain/repositories/facility.repository.interface';
import type { IListingRepository } from '../modules/listing/domain/repositories/listing.repository.interface';
import { LISTING_REPOSITORY } from '../modules/listing/domain/repositories/listing.repository.interface';
import { SlotState } from '../modules/listing/domain/value-objects/slot-state.vo';
import { PartialFailureError } from '../shared/domain/errors/domain.errors';
import { writeSlotState } from './slot-writer';

export type InconsistencyKind =
  | 'facility_capacity_drift'
  | 'orphaned_slot_hold'
  | 'listing_flag_drift'
  | 'missing_slot_hold';

export interface Inconsistency {
  kind: InconsistencyKind;
  /** Facility id, listing id, `listingId/slotId` or booking id. */
  resourceId: string;
  detail: string;
  repaired: boolean;
}

export interface ReconciliationReport {
  checkedAt: Date;
  inconsistencies: Inconsistency[];
}

/**
 * Compares capacity counters, slot holds and listing flags against the
 * bookings that should account for them. Drift can only come from a commit
 * whose outcome was unknown, so every finding is logged as a partial failure.
 * Capacity drift, orphaned slot holds and stale listing flags are repaired;
 * a holding booking without its slot is only reported.
 *
 * The scans read outside any transaction and only nominate suspects. Each
 * suspect is judged again under the row lock its writers take (the facility
 * row, or the listing row for slots and flags), so a booking that commits
 * while the scan runs is never mistaken for drift.
 */
@Injectable()
export class ReconciliationService {
  constructor(
    @Inject(PARKING_UNIT_OF_WORK) private readonly unitOfWork: IParkingUnitOfWork,
    @Inject(BOOKING_REPOSITORY) private readonly bookingRepository: IBookingRepository,
    @Inject(FACILITY_REPOSITORY) private readonly facilityRepository: IFacilityRepository,
    @Inject(LISTING_REPOSITORY) private readonly listingRepository: IListingRepository,
    private readonly logger: CustomLoggerService,
    private readonly metrics: MetricsService,
  ) { }

  async reconcile(options: { repair?: boolean } = {}): Promise<ReconciliationReport> {
    const repair = options.repair ?? true;

    const inconsistencies = [
      ...await this.checkFacilities(repair),
      ...await this.checkSlotHolds(repair),
      ...await this.checkListingFlags(repair),
      ...await this.checkMissingHolds(),
    ];

    for (const finding of inconsistencies) {
      this.metrics.recordReconciliationFinding(finding.kind, finding.repaired);
      this.logger.logError(
        new PartialFailureError(finding.detail, { kind: finding.kind, resourceId: finding.resourceId }),
        { kind: finding.kind, resourceId: finding.resourceId, repaired: finding.repaired },
      );
    }
    this.logger.logBusinessEvent('reconciliation_completed', {
      inconsistencies: inconsistencies.length,
      repaired: inconsistencies.filter(finding => finding.repaired).length,
    });

    return { checkedAt: new Date(), inconsistencies };
  }

  private async checkFacilities(repair: boolean): Promise<Inconsistency[]> {
    const findings: Inconsistency[] = [];

    for (const { id } of await this.facilityRepository.findAll()) {
      const finding = await this.unitOfWork.run(async (repos): Promise<Inconsistency | null> => {
        const facility = await repos.facilities.lock(id);
        const held = await repos.bookings.countHoldingByFacility(id);
        const expected = Math.max(0, facility.capacity.total - held);
        const observed = facility.capacity.available;
        if (observed === expected) return null;

        return {
          kind: 'facility_capacity_drift',
          resourceId: id,
          detail: `Facility ${id} has ${observed} available, ${held} holding bookings imply ${expected}`,
          repaired: repair && await repos.facilities.correctAvailable(id, observed, expected),
        };
      });
      if (finding) findings.push(finding);
    }
    return findings;
  }

  private async checkSlotHolds(repair: boolean): Promise<Inconsistency[]> {
    const findings: Inconsistency[] = [];

    for (const listing of await this.listingRepository.findAll()) {
      for (const slot of listing.slots) {
        const holderId = slot.state.bookingId;
        if (holderId === null) continue;

        const suspect = await this.bookingRepository.findById(holderId);
        if (suspect && this.holdsSlot(suspect, listing.id, slot.slotId)) continue;

        const finding = await this.unitOfWork.run(async (repos): Promise<Inconsistency | null> => {
          const locked = await repos.listings.lock(listing.id);
          if (!locked.findSlot(slot.slotId)?.state.isHeldBy(holderId)) return null;

          const holder = await repos.bookings.findById(holderId);
          if (holder && this.holdsSlot(holder, listing.id, slot.slotId)) return null;

          if (repair) {
            await writeSlotState(repos, listing.id, slot.slotId, SlotState.free(), holderId);
          }
          const reason = holder ? `booking ${holderId} is ${holder.status}` : `booking ${holderId} does not exist`;
          return {
            kind: 'orphaned_slot_hold',
            resourceId: `${listing.id}/${slot.slotId}`,
            detail: `Slot ${slot.slotId} of listing ${listing.id} is held but ${reason}`,
            repaired: repair,
          };
        });
        if (finding) findings.push(finding);
      }
    }
    return findings;
  }

  private async checkListingFlags(repair: boolean): Promise<Inconsistency[]> {
    const findings: Inconsistency[] = [];

    for (const listing of await this.listingRepository.findAll()) {
      if (listing.hasActiveBooking === listing.hasHeldSlot) continue;

      const finding = await this.unitOfWork.run(async (repos): Promise<Inconsistency | null> => {
        const locked = await repos.listings.lock(listing.id);
        if (locked.hasActiveBooking === locked.hasHeldSlot) return null;

        if (repair) {
          await repos.listings.setActiveBookingFlag(listing.id, locked.hasHeldSlot);
        }
        return {
          kind: 'listing_flag_drift',
          resourceId: listing.id,
          detail: `Listing ${listing.id} flag is ${locked.hasActiveBooking} but its slots say ${locked.hasHeldSlot}`,
          repaired: repair,
        };
      });
      if (finding) findings.push(finding);
    }
    return findings;
  }

  private async checkMissingHolds(): Promise<Inconsistency[]> {
    const findings: Inconsistency[] = [];

    for (const booking of await this.bookingRepository.findHolding()) {
      if (booking.resource.type !== 'private') continue;
      const { listingId, slotId } = booking.resource;

      const listing = await this.listingRepository.findById(listingId);
      if (listing?.findSlot(slotId)?.state.isHeldBy(booking.id)) continue;

      const finding = await this.unitOfWork.run(async (repos): Promise<Inconsistency | null> => {
        const locked = listing ? await repos.listings.lock(listingId) : null;
        const current = await repos.bookings.findById(booking.id);
        if (!current || !this.holdsSlot(current, listingId, slotId)) return null;
        if (locked?.findSlot(slotId)?.state.isHeldBy(booking.id)) return null;

        return {
          kind: 'missing_slot_hold',
          resourceId: booking.id,
          detail: `Booking ${booking.id} is ${current.status} but slot ${slotId} of listing ${listingId} is not held by it`,
          repaired: false,
        };
      });
      if (finding) findings.push(finding);
    }
    return findings;
  }

  private holdsSlot(booking: Booking, listingId: string, slotId: string): boolean {
    return booking.holdsResource &&
      booking.resource.type === 'private' &&
      booking.resource.listingId === listingId &&
      booking.resource.slotId === slotId;
  }
}
