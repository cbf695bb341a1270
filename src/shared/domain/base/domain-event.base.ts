export abstract class DomainEvent {
    readonly occurredOn: Date;

    protected constructor(readonly eventName: string) {
        this.occurredOn = new Date();
    }

    abstract toPayload(): Record<string, unknown>;
}
