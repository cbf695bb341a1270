import { Throttle } from '@nestjs/throttler';

export const ThrottleConfig = {
  // Booking creation and lifecycle writes
  BOOKING: { default: { ttl: 60000, limit: 30 } },

  // Gate checks; a wrong code is logged as a security event
  ACCESS_CODE: { default: { ttl: 60000, limit: 10 } },

  // Facility and profile management
  MANAGEMENT: { default: { ttl: 60000, limit: 60 } },
};

export const ThrottleBooking = () => Throttle(ThrottleConfig.BOOKING);
export const ThrottleAccessCode = () => Throttle(ThrottleConfig.ACCESS_CODE);
export const ThrottleManagement = () => Throttle(ThrottleConfig.MANAGEMENT);
