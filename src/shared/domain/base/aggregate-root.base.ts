import { DomainEvent } from './domain-event.base';

/**
 * Root of a consistency boundary. Collects the events raised by its behaviour
 * until they are published after the surrounding transaction commits.
 */
export abstract class AggregateRoot<TProps extends object> {
    private readonly pendingEvents: DomainEvent[] = [];

    protected constructor(
        readonly id: string,
        protected props: TProps,
    ) {}

    get domainEvents(): readonly DomainEvent[] {
        return this.pendingEvents;
    }

    protected addDomainEvent(event: DomainEvent): void {
        this.pendingEvents.push(event);
    }

    clearDomainEvents(): void {
        this.pendingEvents.length = 0;
    }
}
