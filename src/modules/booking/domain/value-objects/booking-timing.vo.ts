import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface BookingTimingProps {
    readonly requestedAt: Date;
    readonly scheduledStart: Date;
    readonly scheduledEnd: Date;
    readonly actualStart: Date | null;
    readonly actualEnd: Date | null;
}

export class BookingTiming extends ValueObject<BookingTimingProps> {
    private constructor(props: BookingTimingProps) {
        super(props);
    }

    get requestedAt(): Date { return this.props.requestedAt; }
    get scheduledStart(): Date { return this.props.scheduledStart; }
    get scheduledEnd(): Date { return this.props.scheduledEnd; }
    get actualStart(): Date | null { return this.props.actualStart; }
    get actualEnd(): Date | null { return this.props.actualEnd; }

    get scheduledHours(): number {
        return (this.props.scheduledEnd.getTime() - this.props.scheduledStart.getTime()) / 3_600_000;
    }

    static schedule(params: { requestedAt: Date; scheduledStart: Date; scheduledEnd: Date }): BookingTiming {
        return BookingTiming.create({ ...params, actualStart: null, actualEnd: null });
    }

    static create(props: BookingTimingProps): BookingTiming {
        if (props.scheduledStart.getTime() >= props.scheduledEnd.getTime()) {
            throw new Error('Scheduled start must be before scheduled end');
        }
        if (props.actualStart && props.actualEnd && props.actualEnd.getTime() < props.actualStart.getTime()) {
            throw new Error('Actual end cannot precede actual start');
        }
        return new BookingTiming(props);
    }

    withActualStart(at: Date): BookingTiming {
        return new BookingTiming({ ...this.props, actualStart: at });
    }

    withActualEnd(at: Date): BookingTiming {
        return new BookingTiming({ ...this.props, actualEnd: at });
    }

    protected equalsCore(other: BookingTiming): boolean {
        return this.props.requestedAt.getTime() === other.props.requestedAt.getTime() &&
            this.props.scheduledStart.getTime() === other.props.scheduledStart.getTime() &&
            this.props.scheduledEnd.getTime() === other.props.scheduledEnd.getTime();
    }
}
