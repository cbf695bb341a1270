import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { PARKING_CONFIG_DEFAULTS, type ParkingConfig } from '../common/config/parking.config';
import { CustomLoggerService } from '../common/services/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { requireActor } from '../common/utils/require-actor';
import { toError } from '../common/utils/to-error';
import { Booking, type BookingResource } from '../modules/booking/domain/aggregates/booking.aggregate';
import { BookingRequestPolicy } from '../modules/booking/domain/policies/booking-request.policy';
import { BookingTransitionPolicy } from '../modules/booking/domain/policies/booking-transition.policy';
import { HostPayoutPolicy } from '../modules/booking/domain/policies/host-payout.policy';
import { NoShowPolicy } from '../modules/booking/domain/policies/no-show.policy';
import type { IBookingRepository } from '../modules/booking/domain/repositories/booking.repository.interface';
import { BOOKING_REPOSITORY } from '../modules/booking/domain/repositories/booking.repository.interface';
import type {
  IParkingUnitOfWork,
  ParkingRepositories,
} from '../modules/booking/domain/repositories/parking-unit-of-work.interface';
import { PARKING_UNIT_OF_WORK } from '../modules/booking/domain/repositories/parking-unit-of-work.interface';
import type { BookingStatus } from '../modules/booking/domain/value-objects/booking-status';
import type { UserProfile } from '../modules/identity/domain/entities/user-profile.entity';
import { SlotState } from '../modules/listing/domain/value-objects/slot-state.vo';
import {
  InvalidRequestError,
  InvalidTransitionError,
  NotFoundError,
  NotPermittedError,
  StaleTransitionError,
} from '../shared/domain/errors/domain.errors';
import { DomainEventPublisher } from '../shared/infrastructure/domain-event-publisher';
import { writeSlotState } from './slot-writer';

type PrivateResource = Extract<BookingResource, { type: 'private' }>;

export interface RequestPrivateBookingInput {
  listingId: string;
  slotId: string;
  scheduledStart: Date;
  scheduledEnd: Date;
  agreedRate: number;
  estimatedCost: number;
  driverMessage?: string;
}

export interface BookCommercialSpotInput {
  facilityId: string;
  scheduledStart: Date;
  scheduledEnd: Date;
  hourlyRate: number;
  estimatedDuration: number;
  estimatedCost: number;
  vehicleNumber?: string;
  vehicleType?: string;
}

export interface NoShowSweepResult {
  markedNoShow: number;
  skipped: number;
}

/**
 * Booking orchestrator. Every lifecycle step runs in one unit of work: the
 * status compare-and-swap, the slot or capacity write and the profile side
 * effects commit together. Domain events go out only after the commit.
 */
@Injectable()
export class BookingsService {
  constructor(
    @Inject(PARKING_UNIT_OF_WORK) private readonly unitOfWork: IParkingUnitOfWork,
    @Inject(BOOKING_REPOSITORY) private readonly bookingRepository: IBookingRepository,
    private readonly eventPublisher: DomainEventPublisher,
    private readonly logger: CustomLoggerService,
    private readonly metrics: MetricsService,
    private readonly configService: ConfigService,
  ) { }

  async requestPrivateBooking(actorId: string | undefined, input: RequestPrivateBookingInput): Promise<Booking> {
    const driverId = requireActor(actorId);
    this.assertValidRequest(input.scheduledStart, input.scheduledEnd, {
      agreedRate: input.agreedRate,
      estimatedCost: input.estimatedCost,
    });
    const { privateTaxRate } = this.parkingConfig;

    const { draft, stored } = await this.unitOfWork.run(async repos => {
      BookingsService.assertCanDrive(await repos.profiles.get(driverId));

      const listing = await repos.listings.lock(input.listingId);
      if (!listing.isActive) {
        throw new NotPermittedError('Listing is not accepting bookings', { listingId: listing.id });
      }
      if (listing.hostId === driverId) {
        throw new NotPermittedError('Hosts cannot book their own listing', { listingId: listing.id });
      }
      if (!listing.findSlot(input.slotId)) {
        throw new NotFoundError('Slot', `${input.listingId}/${input.slotId}`);
      }

      const draft = Booking.requestPrivate({
        id: randomUUID(),
        driverId,
        hostId: listing.hostId,
        listingId: input.listingId,
        slotId: input.slotId,
        scheduledStart: input.scheduledStart,
        scheduledEnd: input.scheduledEnd,
        agreedRate: input.agreedRate,
        estimatedCost: input.estimatedCost,
        taxRate: privateTaxRate,
        driverMessage: input.driverMessage,
        autoAccept: listing.autoAcceptBookings,
        now: new Date(),
      });

      const id = await repos.bookings.create(draft);
      if (draft.holdsResource && draft.resource.type === 'private') {
        await this.writeSlot(repos, draft.resource, SlotState.reservedFor(id, draft.timing.scheduledEnd), null);
      }
      await repos.profiles.incrementDriverBookingCount(driverId);

      return { draft, stored: await repos.bookings.get(id) };
    });

    this.publish(draft);
    this.logger.logBusinessEvent('private_booking_requested', {
      bookingId: stored.id,
      driverId,
      hostId: stored.hostId,
      listingId: input.listingId,
      slotId: input.slotId,
      status: stored.status,
    });

    return stored;
  }

  async bookCommercialSpot(actorId: string | undefined, input: BookCommercialSpotInput): Promise<Booking> {
    const driverId = requireActor(actorId);
    this.assertValidRequest(input.scheduledStart, input.scheduledEnd, {
      hourlyRate: input.hourlyRate,
      estimatedDuration: input.estimatedDuration,
      estimatedCost: input.estimatedCost,
    });
    if (input.estimatedDuration <= 0) {
      throw new InvalidRequestError('estimatedDuration must be greater than zero');
    }

    const { draft, stored } = await this.unitOfWork.run(async repos => {
      BookingsService.assertCanDrive(await repos.profiles.get(driverId));

      const facility = await repos.facilities.get(input.facilityId);
      if (!facility.acceptsBookings) {
        throw new NotPermittedError('Facility is not accepting bookings', { facilityId: facility.id });
      }
      if (facility.ownerId === driverId) {
        throw new NotPermittedError('Owners cannot book their own facility', { facilityId: facility.id });
      }

      await repos.facilities.reserve(facility.id);

      const draft = Booking.bookCommercial({
        id: randomUUID(),
        driverId,
        hostId: facility.ownerId,
        facilityId: facility.id,
        scheduledStart: input.scheduledStart,
        scheduledEnd: input.scheduledEnd,
        hourlyRate: input.hourlyRate,
        estimatedDuration: input.estimatedDuration,
        estimatedCost: input.estimatedCost,
        vehicle: input.vehicleNumber !== undefined || input.vehicleType !== undefined
          ? { vehicleNumber: input.vehicleNumber ?? null, vehicleType: input.vehicleType ?? null }
          : undefined,
        now: new Date(),
      });

      const id = await repos.bookings.create(draft);
      await repos.profiles.incrementDriverBookingCount(driverId);

      return { draft, stored: await repos.bookings.get(id) };
    });

    this.publish(draft);
    this.logger.logBusinessEvent('commercial_booking_confirmed', {
      bookingId: stored.id,
      driverId,
      hostId: stored.hostId,
      facilityId: input.facilityId,
    });

    return stored;
  }

  async approveBooking(actorId: string | undefined, bookingId: string, hostMessage?: string): Promise<Booking> {
    const hostId = requireActor(actorId);

    const booking = await this.transition(
      bookingId,
      current => {
        BookingsService.assertHost(current, hostId);
        current.approve(new Date(), hostMessage);
      },
      async (current, repos) => {
        if (current.resource.type === 'private') {
          await this.writeSlot(
            repos,
            current.resource,
            SlotState.reservedFor(current.id, current.timing.scheduledEnd),
            null,
          );
        }
      },
    );

    this.logger.logBusinessEvent('booking_approved', { bookingId, hostId });
    return booking;
  }

  async rejectBooking(
    actorId: string | undefined,
    bookingId: string,
    reason: string,
    hostMessage?: string,
  ): Promise<Booking> {
    const hostId = requireActor(actorId);
    if (reason.trim().length === 0) {
      throw new InvalidRequestError('A rejection reason is required');
    }

    const booking = await this.transition(bookingId, current => {
      BookingsService.assertHost(current, hostId);
      current.reject(reason, hostMessage);
    });

    this.logger.logBusinessEvent('booking_rejected', { bookingId, hostId, reason });
    return booking;
  }

  /**
   * Driver cancellation. A private booking is cancelled at once and frees its
   * slot if it held one; a commercial booking moves to cancel_requested and
   * keeps its capacity until the owner confirms.
   */
  async cancelBooking(actorId: string | undefined, bookingId: string): Promise<Booking> {
    const driverId = requireActor(actorId);

    const booking = await this.transition(
      bookingId,
      current => {
        BookingsService.assertDriver(current, driverId);
        current.requestCancellation();
      },
      async (current, repos, previous) => {
        if (current.resource.type === 'private' &&
          BookingTransitionPolicy.holdsResource(current.type, previous)) {
          await this.writeSlot(repos, current.resource, SlotState.free(), current.id);
        }
      },
    );

    this.logger.logBusinessEvent('booking_cancellation_requested', {
      bookingId,
      driverId,
      status: booking.status,
    });
    return booking;
  }

  async confirmCancellation(actorId: string | undefined, bookingId: string): Promise<Booking> {
    const hostId = requireActor(actorId);

    const booking = await this.transition(
      bookingId,
      current => {
        BookingsService.assertHost(current, hostId);
        current.confirmCancellation();
      },
      (current, repos) => this.releaseResource(repos, current),
    );

    this.logger.logBusinessEvent('booking_cancellation_confirmed', { bookingId, hostId });
    return booking;
  }

  async startSession(actorId: string | undefined, bookingId: string): Promise<Booking> {
    const userId = requireActor(actorId);

    const booking = await this.transition(
      bookingId,
      current => {
        BookingsService.assertParticipant(current, userId);
        current.start(new Date());
      },
      async (current, repos) => {
        if (current.resource.type === 'private') {
          await this.writeSlot(
            repos,
            current.resource,
            SlotState.occupiedBy(current.id, current.timing.scheduledEnd),
            current.id,
          );
        }
      },
    );

    this.logger.logBusinessEvent('booking_session_started', { bookingId, userId });
    return booking;
  }

  /**
   * Completes an active booking. A private host is credited from the
   * estimated cost, whatever the final charge.
   */
  async endSession(actorId: string | undefined, bookingId: string, actualCost?: number): Promise<Booking> {
    const userId = requireActor(actorId);
    if (actualCost !== undefined) {
      this.assertValidAmounts({ actualCost });
    }
    const { hostPayoutRate } = this.parkingConfig;

    const booking = await this.transition(
      bookingId,
      current => {
        BookingsService.assertParticipant(current, userId);
        current.complete(new Date(), actualCost);
      },
      async (current, repos) => {
        await this.releaseResource(repos, current);
        if (current.type === 'private') {
          const earnings = HostPayoutPolicy.calculateHostEarnings(current.pricing.estimatedCost, hostPayoutRate);
          await repos.profiles.addHostEarnings(current.hostId, earnings);
        }
      },
    );

    this.logger.logBusinessEvent('booking_session_ended', {
      bookingId,
      userId,
      actualCost: booking.pricing.actualCost,
    });
    return booking;
  }

  async markNoShow(actorId: string | undefined, bookingId: string): Promise<Booking> {
    const hostId = requireActor(actorId);
    const { noShowGraceMinutes } = this.parkingConfig;

    const booking = await this.transition(
      bookingId,
      current => {
        BookingsService.assertHost(current, hostId);
        if (BookingTransitionPolicy.canTransition(current.type, current.status, 'no_show')) {
          const verdict = NoShowPolicy.canMarkNoShow({
            scheduledStart: current.timing.scheduledStart,
            now: new Date(),
            graceMinutes: noShowGraceMinutes,
          });
          if (!verdict.allowed) {
            throw new InvalidRequestError(verdict.reason ?? 'Too early to record a no-show', { bookingId });
          }
        }
        current.markNoShow();
      },
      (current, repos) => this.releaseResource(repos, current),
    );

    this.logger.logBusinessEvent('booking_no_show', { bookingId, hostId });
    return booking;
  }

  /**
   * Closes confirmed bookings whose driver never arrived. Bookings that moved
   * on while the sweep ran are skipped.
   */
  async sweepNoShows(now: Date = new Date()): Promise<NoShowSweepResult> {
    const { noShowGraceMinutes, noShowSweepBatchSize } = this.parkingConfig;
    const overdue = await this.bookingRepository.findOverdueConfirmed(
      NoShowPolicy.overdueCutoff(now, noShowGraceMinutes),
      noShowSweepBatchSize,
    );

    const result: NoShowSweepResult = { markedNoShow: 0, skipped: 0 };
    for (const candidate of overdue) {
      try {
        await this.transition(
          candidate.id,
          current => current.markNoShow(),
          (current, repos) => this.releaseResource(repos, current),
        );
        result.markedNoShow += 1;
      } catch (error) {
        if (error instanceof StaleTransitionError || error instanceof InvalidTransitionError) {
          result.skipped += 1;
          continue;
        }
        throw error;
      }
    }

    if (result.markedNoShow > 0 || result.skipped > 0) {
      this.logger.logBusinessEvent('no_show_sweep', { ...result });
    }
    return result;
  }

  async verifyAccessCode(actorId: string | undefined, bookingId: string, code: string): Promise<boolean> {
    const hostId = requireActor(actorId);
    const booking = await this.bookingRepository.get(bookingId);
    BookingsService.assertHost(booking, hostId);

    const valid = booking.accessCode.matches(code);
    if (!valid) {
      this.logger.logSecurityEvent('access_code_mismatch', { bookingId, userId: hostId });
    }
    return valid;
  }

  async getBooking(actorId: string | undefined, bookingId: string): Promise<Booking> {
    const userId = requireActor(actorId);
    const booking = await this.bookingRepository.get(bookingId);
    BookingsService.assertParticipant(booking, userId);
    return booking;
  }

  async listDriverBookings(actorId: string | undefined): Promise<Booking[]> {
    return this.bookingRepository.findByDriver(requireActor(actorId));
  }

  async listHostBookings(actorId: string | undefined): Promise<Booking[]> {
    return this.bookingRepository.findByHost(requireActor(actorId));
  }

  async listPendingApprovals(actorId: string | undefined): Promise<Booking[]> {
    return this.bookingRepository.findPendingApprovals(requireActor(actorId));
  }

  async listActiveBookings(actorId: string | undefined): Promise<Booking[]> {
    return this.bookingRepository.findActiveByDriver(requireActor(actorId));
  }

  /**
   * Loads the booking, lets `change` check the caller and move the aggregate,
   * then writes the new status with a compare-and-swap on the old one and runs
   * `effects`, all in one unit of work.
   */
  private async transition(
    bookingId: string,
    change: (booking: Booking) => void,
    effects?: (booking: Booking, repos: ParkingRepositories, previous: BookingStatus) => Promise<void>,
  ): Promise<Booking> {
    const booking = await this.unitOfWork.run(async repos => {
      const current = await repos.bookings.get(bookingId);
      const previous = current.status;

      change(current);
      await repos.bookings.updateStatus(current.id, previous, current.status, current.transitionFields());
      if (effects) {
        await effects(current, repos, previous);
      }

      return current;
    });

    this.publish(booking);
    return booking;
  }

  /** Listeners run synchronously; by now the change is committed either way. */
  private publish(booking: Booking): void {
    this.metrics.recordBookingTransition(booking.type, booking.status);
    try {
      this.eventPublisher.publishEventsFromAggregate(booking);
    } catch (error) {
      this.logger.logError(toError(error), { bookingId: booking.id, stage: 'publish_events' });
    }
  }

  private async releaseResource(repos: ParkingRepositories, booking: Booking): Promise<void> {
    if (booking.resource.type === 'private') {
      await this.writeSlot(repos, booking.resource, SlotState.free(), booking.id);
    } else {
      await repos.facilities.release(booking.resource.facilityId);
    }
  }

  private async writeSlot(
    repos: ParkingRepositories,
    resource: PrivateResource,
    next: SlotState,
    expectedHolder: string | null,
  ): Promise<void> {
    await writeSlotState(repos, resource.listingId, resource.slotId, next, expectedHolder);
  }

  private get parkingConfig(): ParkingConfig {
    return this.configService.get<ParkingConfig>('parking') ?? PARKING_CONFIG_DEFAULTS;
  }

  private assertValidRequest(scheduledStart: Date, scheduledEnd: Date, amounts: Record<string, number>): void {
    const schedule = BookingRequestPolicy.validateSchedule({ scheduledStart, scheduledEnd });
    if (!schedule.valid) {
      throw new InvalidRequestError(schedule.error ?? 'Invalid schedule');
    }
    this.assertValidAmounts(amounts);
  }

  private assertValidAmounts(amounts: Record<string, number>): void {
    const verdict = BookingRequestPolicy.validateAmounts(amounts);
    if (!verdict.valid) {
      throw new InvalidRequestError(verdict.error ?? 'Invalid amount');
    }
  }

  private static assertCanDrive(profile: UserProfile): void {
    if (!profile.can('canDrive')) {
      throw new NotPermittedError('Driving is not enabled for this account', { userId: profile.id });
    }
  }

  private static assertHost(booking: Booking, userId: string): void {
    if (booking.hostId !== userId) {
      throw new NotPermittedError('Only the host of this booking can do that', { bookingId: booking.id });
    }
  }

  private static assertDriver(booking: Booking, userId: string): void {
    if (booking.driverId !== userId) {
      throw new NotPermittedError('Only the driver of this booking can do that', { bookingId: booking.id });
    }
  }

  private static assertParticipant(booking: Booking, userId: string): void {
    if (booking.driverId !== userId && booking.hostId !== userId) {
      throw new NotPermittedError('Not a participant of this booking', { bookingId: booking.id });
    }
  }
}
