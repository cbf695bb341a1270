import { Inject, Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Observable, concatMap, from, map, startWith } from 'rxjs';
import type { Booking } from '../modules/booking/domain/aggregates/booking.aggregate';
import {
  BOOKING_CHANGE_EVENTS,
  type BookingChangePayload,
  isBookingChangePayload,
} from '../modules/booking/domain/events/booking-event-names';
import type { IBookingRepository } from '../modules/booking/domain/repositories/booking.repository.interface';
import { BOOKING_REPOSITORY } from '../modules/booking/domain/repositories/booking.repository.interface';
import { requireActor } from '../common/utils/require-actor';
import { type BookingView, toBookingView } from './dto/booking-view.dto';

/**
 * Live booking lists. Each subscription emits the full result set once on
 * subscribe and again after every booking event that concerns the viewer.
 * Snapshots are re-read from the ledger, so a redelivered event only costs an
 * identical snapshot. Unsubscribing removes the listeners.
 */
@Injectable()
export class BookingFeedService {
  constructor(
    @Inject(BOOKING_REPOSITORY) private readonly bookingRepository: IBookingRepository,
    private readonly eventEmitter: EventEmitter2,
  ) { }

  watchDriverBookings(actorId: string | undefined): Observable<BookingView[]> {
    const driverId = requireActor(actorId);
    return this.watch(
      driverId,
      () => this.bookingRepository.findByDriver(driverId),
      change => change.driverId === driverId,
    );
  }

  watchPendingApprovals(actorId: string | undefined): Observable<BookingView[]> {
    const hostId = requireActor(actorId);
    return this.watch(
      hostId,
      () => this.bookingRepository.findPendingApprovals(hostId),
      change => change.hostId === hostId,
    );
  }

  private watch(
    viewerId: string,
    load: () => Promise<Booking[]>,
    concerns: (change: BookingChangePayload) => boolean,
  ): Observable<BookingView[]> {
    return this.changes(concerns).pipe(
      startWith(undefined),
      concatMap(() => from(load())),
      map(bookings => bookings.map(booking => toBookingView(booking, viewerId))),
    );
  }

  private changes(concerns: (change: BookingChangePayload) => boolean): Observable<void> {
    return new Observable<void>(subscriber => {
      const listener = (payload: unknown): void => {
        if (isBookingChangePayload(payload) && concerns(payload)) {
          subscriber.next();
        }
      };

      for (const eventName of BOOKING_CHANGE_EVENTS) {
        this.eventEmitter.on(eventName, listener);
      }

      return () => {
        for (const eventName of BOOKING_CHANGE_EVENTS) {
          this.eventEmitter.off(eventName, listener);
        }
      };
    });
  }
}
