import { registerAs } from '@nestjs/config';

export interface ParkingConfig {
  /** Share of a private booking's estimated cost credited to the host. */
  hostPayoutRate: number;
  /** Tax charged on private bookings, as a fraction of the estimated cost. */
  privateTaxRate: number;
  noShowGraceMinutes: number;
  maintenanceIntervalSeconds: number;
  noShowSweepBatchSize: number;
}

export const PARKING_CONFIG_DEFAULTS: Readonly<ParkingConfig> = {
  hostPayoutRate: 0.85,
  privateTaxRate: 0.18,
  noShowGraceMinutes: 30,
  maintenanceIntervalSeconds: 300,
  noShowSweepBatchSize: 100,
};

function readNumber(
  key: string,
  fallback: number,
  isValid: (value: number) => boolean,
  requirement: string,
): number {
  const raw = process.env[key];
  const value = raw === undefined || raw === '' ? fallback : Number(raw);

  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`${key} must be ${requirement}`);
  }

  return value;
}

const isFraction = (value: number): boolean => value >= 0 && value <= 1;
const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

export default registerAs('parking', (): ParkingConfig => ({
  hostPayoutRate: readNumber(
    'PARKING_HOST_PAYOUT_RATE', PARKING_CONFIG_DEFAULTS.hostPayoutRate, isFraction, 'between 0 and 1',
  ),
  privateTaxRate: readNumber(
    'PARKING_PRIVATE_TAX_RATE', PARKING_CONFIG_DEFAULTS.privateTaxRate, isFraction, 'between 0 and 1',
  ),
  noShowGraceMinutes: readNumber(
    'PARKING_NO_SHOW_GRACE_MINUTES', PARKING_CONFIG_DEFAULTS.noShowGraceMinutes,
    value => value >= 0, 'a non-negative number',
  ),
  maintenanceIntervalSeconds: readNumber(
    'PARKING_MAINTENANCE_INTERVAL_SECONDS', PARKING_CONFIG_DEFAULTS.maintenanceIntervalSeconds,
    isPositiveInteger, 'a positive integer',
  ),
  noShowSweepBatchSize: readNumber(
    'PARKING_NO_SHOW_BATCH_SIZE', PARKING_CONFIG_DEFAULTS.noShowSweepBatchSize,
    isPositiveInteger, 'a positive integer',
  ),
}));
