import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DomainEvent } from '../domain/base/domain-event.base';
import { AggregateRoot } from '../domain/base/aggregate-root.base';

/**
 * Hands aggregate events to the in-process event bus. Call it only after the
 * transaction that produced them has committed.
 */
@Injectable()
export class DomainEventPublisher {
    constructor(private readonly eventEmitter: EventEmitter2) { }

    publishEventsFromAggregate<T extends object>(aggregate: AggregateRoot<T>): void {
        const events = [...aggregate.domainEvents];
        aggregate.clearDomainEvents();
        for (const event of events) {
            this.publish(event);
        }
    }

    publish(event: DomainEvent): void {
        this.eventEmitter.emit(event.eventName, event.toPayload());
    }
}
