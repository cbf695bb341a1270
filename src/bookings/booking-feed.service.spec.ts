import type { Subscription } from 'rxjs';
import { NotAuthenticatedError } from '../shared/domain/errors/domain.errors';
import { createParkingTestingModule, type ParkingTestContext } from '../../test/support/parking-testing-module';
import { BookingFeedService } from './booking-feed.service';
import { BookingsService } from './bookings.service';
import type { BookingView } from './dto/booking-view.dto';

const HOST = 'host-1';
const DRIVER = 'driver-1';
const OTHER_DRIVER = 'driver-2';

const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

describe('BookingFeedService', () => {
  let ctx: ParkingTestContext;
  let feed: BookingFeedService;
  let bookings: BookingsService;
  let subscription: Subscription | undefined;

  const request = (driverId: string) => bookings.requestPrivateBooking(driverId, {
    listingId: 'listing-1',
    slotId: 'A',
    scheduledStart: new Date(Date.now() + 3_600_000),
    scheduledEnd: new Date(Date.now() + 7_200_000),
    agreedRate: 8,
    estimatedCost: 16,
  });

  beforeEach(async () => {
    ctx = await createParkingTestingModule([BookingsService, BookingFeedService]);
    feed = ctx.module.get(BookingFeedService);
    bookings = ctx.module.get(BookingsService);

    ctx.store.seedProfile(HOST);
    ctx.store.seedProfile(DRIVER);
    ctx.store.seedProfile(OTHER_DRIVER);
    ctx.store.seedListing({ id: 'listing-1', hostId: HOST, slotIds: ['A'] });
  });

  afterEach(() => {
    subscription?.unsubscribe();
    subscription = undefined;
  });

  it('emits the driver\'s bookings on subscribe and after each of their changes', async () => {
    const snapshots: BookingView[][] = [];
    subscription = feed.watchDriverBookings(DRIVER).subscribe(views => snapshots.push(views));
    await flush();
    expect(snapshots).toEqual([[]]);

    const booking = await request(DRIVER);
    await flush();

    expect(snapshots).toHaveLength(2);
    expect(snapshots[1].map(view => view.id)).toEqual([booking.id]);
    expect(snapshots[1][0].accessCode).toBe(booking.accessCode.value);

    await request(OTHER_DRIVER);
    await flush();
    expect(snapshots).toHaveLength(2);
  });

  it('drops answered requests from the host\'s pending approvals', async () => {
    const snapshots: string[][] = [];
    subscription = feed.watchPendingApprovals(HOST)
      .subscribe(views => snapshots.push(views.map(view => view.id)));
    await flush();

    const booking = await request(DRIVER);
    await flush();
    await bookings.approveBooking(HOST, booking.id);
    await flush();

    expect(snapshots).toEqual([[], [booking.id], []]);
  });

  it('hides the access code from the host', async () => {
    const snapshots: BookingView[][] = [];
    subscription = feed.watchPendingApprovals(HOST).subscribe(views => snapshots.push(views));
    await request(DRIVER);
    await flush();

    const latest = snapshots[snapshots.length - 1];
    expect(latest).toHaveLength(1);
    expect(latest[0].accessCode).toBeUndefined();
  });

  it('reloads on booking notifications from other processes', async () => {
    let emissions = 0;
    subscription = feed.watchDriverBookings(DRIVER).subscribe(() => {
      emissions += 1;
    });
    await flush();

    ctx.events.emit('booking.changed', { bookingId: 'elsewhere', driverId: DRIVER, hostId: HOST, status: 'cancelled' });
    ctx.events.emit('booking.changed', { bookingId: 'elsewhere' });
    await flush();

    expect(emissions).toBe(2);
  });

  it('removes its listeners when unsubscribed', async () => {
    const active = feed.watchDriverBookings(DRIVER).subscribe();
    expect(ctx.events.listenerCount('booking.requested')).toBe(1);
    expect(ctx.events.listenerCount('booking.changed')).toBe(1);

    active.unsubscribe();
    await flush();

    expect(ctx.events.listenerCount('booking.requested')).toBe(0);
    expect(ctx.events.listenerCount('booking.changed')).toBe(0);
  });

  it('requires a signed-in viewer', () => {
    expect(() => feed.watchDriverBookings(undefined)).toThrow(NotAuthenticatedError);
  });
});
