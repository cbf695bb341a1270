import type { ParkingRepositories } from '../modules/booking/domain/repositories/parking-unit-of-work.interface';
import type { SlotState } from '../modules/listing/domain/value-objects/slot-state.vo';

/**
 * Writes one slot and then the listing's active-booking flag as derived from
 * all of its slots. The listing row stays locked until the unit of work ends,
 * so concurrent writers on the same listing cannot leave a stale flag.
 */
export async function writeSlotState(
  repos: ParkingRepositories,
  listingId: string,
  slotId: string,
  next: SlotState,
  expectedHolder: string | null,
): Promise<void> {
  await repos.listings.lock(listingId);
  await repos.listings.setState(listingId, slotId, next, expectedHolder);

  const listing = await repos.listings.get(listingId);
  await repos.listings.setActiveBookingFlag(listingId, listing.hasHeldSlot);
}
