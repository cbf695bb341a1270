import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { Notification, PoolClient } from 'pg';
import { DatabaseClient } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import { CustomLoggerService } from '../../../../common/services/logger.service';
import { toError } from '../../../../common/utils/to-error';
import { BOOKING_CHANGED_EVENT, isBookingChangePayload } from '../../domain/events/booking-event-names';

/** Channel the `bookings` trigger notifies on; see the schema migration. */
export const BOOKING_CHANGES_CHANNEL = 'booking_changes';

/** Wait before retrying after a reconnect attempt failed. */
export const LISTENER_RETRY_DELAY_MS = 5_000;

/**
 * Relays booking row changes made by other processes (API replicas, the
 * maintenance worker) onto the local event bus as `booking.changed`.
 *
 * A connection that errors is handed back to the pool as broken and replaced
 * with a new one; the first attempt is immediate, later ones are spaced by
 * LISTENER_RETRY_DELAY_MS until the database answers again.
 */
@Injectable()
export class BookingChangeListener implements OnModuleInit, OnModuleDestroy {
    private client: PoolClient | null = null;
    private retryTimer: NodeJS.Timeout | null = null;
    private stopped = false;

    constructor(
        @Inject(DATABASE_CLIENT) private readonly db: DatabaseClient,
        private readonly eventEmitter: EventEmitter2,
        private readonly logger: CustomLoggerService,
    ) { }

    async onModuleInit(): Promise<void> {
        await this.listen();
    }

    async onModuleDestroy(): Promise<void> {
        this.stopped = true;
        if (this.retryTimer) {
            clearTimeout(this.retryTimer);
            this.retryTimer = null;
        }

        const client = this.client;
        if (!client) return;
        this.client = null;

        try {
            await client.query(`UNLISTEN ${BOOKING_CHANGES_CHANNEL}`);
        } catch (error) {
            client.release(toError(error));
            throw error;
        }
        client.release();
    }

    private async listen(): Promise<void> {
        const client = await this.db.connectListener();
        client.on('notification', message => this.relay(message));
        client.on('error', error => this.onConnectionError(client, error));

        try {
            await client.query(`LISTEN ${BOOKING_CHANGES_CHANNEL}`);
        } catch (error) {
            client.release(toError(error));
            throw error;
        }

        if (this.stopped) {
            client.release();
            return;
        }
        this.client = client;
        this.logger.log(`Listening for booking changes on ${BOOKING_CHANGES_CHANNEL}`);
    }

    private onConnectionError(client: PoolClient, error: Error): void {
        this.logger.logError(error, { channel: BOOKING_CHANGES_CHANNEL });
        if (this.client !== client) return;

        this.client = null;
        client.release(error);
        this.reconnect();
    }

    private reconnect(): void {
        if (this.stopped) return;

        this.listen().catch((error: unknown) => {
            this.logger.logError(toError(error), { channel: BOOKING_CHANGES_CHANNEL, stage: 'reconnect' });
            if (this.stopped) return;
            this.retryTimer = setTimeout(() => {
                this.retryTimer = null;
                this.reconnect();
            }, LISTENER_RETRY_DELAY_MS);
        });
    }

    private relay(message: Notification): void {
        if (message.channel !== BOOKING_CHANGES_CHANNEL || !message.payload) return;

        let payload: unknown;
        try {
            payload = JSON.parse(message.payload);
        } catch (error) {
            this.logger.logError(toError(error), { channel: message.channel, payload: message.payload });
            return;
        }

        if (!isBookingChangePayload(payload)) {
            this.logger.warn('Ignoring booking notification without booking, driver and host ids', {
                channel: message.channel,
            });
            return;
        }

        this.eventEmitter.emit(BOOKING_CHANGED_EVENT, payload);
    }
}
