import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { PARKING_CONFIG_DEFAULTS, type ParkingConfig } from '../../src/common/config/parking.config';
import { CustomLoggerService } from '../../src/common/services/logger.service';
import { MetricsService } from '../../src/common/services/metrics.service';
import { BOOKING_REPOSITORY } from '../../src/modules/booking/domain/repositories/booking.repository.interface';
import { PARKING_UNIT_OF_WORK } from '../../src/modules/booking/domain/repositories/parking-unit-of-work.interface';
import { FACILITY_REPOSITORY } from '../../src/modules/facility/domain/repositories/facility.repository.interface';
import { USER_PROFILE_REPOSITORY } from '../../src/modules/identity/domain/repositories/user-profile.repository.interface';
import { LISTING_REPOSITORY } from '../../src/modules/listing/domain/repositories/listing.repository.interface';
import { DomainEventPublisher } from '../../src/shared/infrastructure/domain-event-publisher';
import { InMemoryParkingStore } from './in-memory-parking-store';

export function createLoggerStub() {
    return {
        setContext: jest.fn(),
        log: jest.fn(),
        error: jest.fn(),
        warn: jest.fn(),
        debug: jest.fn(),
        verbose: jest.fn(),
        logError: jest.fn(),
        logBusinessEvent: jest.fn(),
        logSecurityEvent: jest.fn(),
        logPerformance: jest.fn(),
    };
}

export type LoggerStub = ReturnType<typeof createLoggerStub>;

export interface ParkingTestContext {
    module: TestingModule;
    store: InMemoryParkingStore;
    logger: LoggerStub;
    events: EventEmitter2;
}

/**
 * Compiles `providers` against one in-memory store. Repository and unit of
 * work tokens resolve to the store; logging is stubbed.
 */
export async function createParkingTestingModule(
    providers: Provider[],
    config: Partial<ParkingConfig> = {},
): Promise<ParkingTestContext> {
    const store = new InMemoryParkingStore();
    const logger = createLoggerStub();
    const events = new EventEmitter2();

    const module = await Test.createTestingModule({
        providers: [
            ...providers,
            DomainEventPublisher,
            MetricsService,
            { provide: EventEmitter2, useValue: events },
            { provide: CustomLoggerService, useValue: logger },
            { provide: ConfigService, useValue: new ConfigService({ parking: { ...PARKING_CONFIG_DEFAULTS, ...config } }) },
            { provide: PARKING_UNIT_OF_WORK, useValue: store },
            { provide: BOOKING_REPOSITORY, useValue: store.repositories.bookings },
            { provide: FACILITY_REPOSITORY, useValue: store.repositories.facilities },
            { provide: LISTING_REPOSITORY, useValue: store.repositories.listings },
            { provide: USER_PROFILE_REPOSITORY, useValue: store.repositories.profiles },
        ],
    }).compile();

    return { module, store, logger, events };
}
