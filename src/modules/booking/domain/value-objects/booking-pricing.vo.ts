import { ValueObject } from '../../../../shared/domain/base/value-object.base';
import { roundCurrency } from '../../../../common/utils/currency';

interface BookingPricingProps {
    /** Agreed rate for private bookings, hourly rate for commercial ones. */
    readonly rate: number;
    readonly estimatedCost: number;
    readonly actualCost: number | null;
    /** Private bookings only. */
    readonly taxAmount: number | null;
    /** Commercial bookings only, in hours. */
    readonly estimatedDuration: number | null;
}

export class BookingPricing extends ValueObject<BookingPricingProps> {
    private constructor(props: BookingPricingProps) {
        super(props);
    }

    get rate(): number { return this.props.rate; }
    get estimatedCost(): number { return this.props.estimatedCost; }
    get actualCost(): number | null { return this.props.actualCost; }
    get taxAmount(): number | null { return this.props.taxAmount; }
    get estimatedDuration(): number | null { return this.props.estimatedDuration; }

    static forPrivate(params: { agreedRate: number; estimatedCost: number; taxRate: number }): BookingPricing {
        return BookingPricing.create({
            rate: params.agreedRate,
            estimatedCost: params.estimatedCost,
            actualCost: null,
            taxAmount: roundCurrency(params.estimatedCost * params.taxRate),
            estimatedDuration: null,
        });
    }

    static forCommercial(params: { hourlyRate: number; estimatedDuration: number; estimatedCost: number }): BookingPricing {
        return BookingPricing.create({
            rate: params.hourlyRate,
            estimatedCost: params.estimatedCost,
            actualCost: null,
            taxAmount: null,
            estimatedDuration: params.estimatedDuration,
        });
    }

    static create(props: BookingPricingProps): BookingPricing {
        const amounts: Array<[string, number | null]> = [
            ['rate', props.rate],
            ['estimatedCost', props.estimatedCost],
            ['actualCost', props.actualCost],
            ['taxAmount', props.taxAmount],
            ['estimatedDuration', props.estimatedDuration],
        ];
        for (const [name, amount] of amounts) {
            if (amount !== null && (!Number.isFinite(amount) || amount < 0)) {
                throw new Error(`${name} must be a non-negative number`);
            }
        }
        return new BookingPricing(props);
    }

    withActualCost(actualCost: number): BookingPricing {
        return BookingPricing.create({ ...this.props, actualCost });
    }

    protected equalsCore(other: BookingPricing): boolean {
        return this.props.rate === other.props.rate &&
            this.props.estimatedCost === other.props.estimatedCost &&
            this.props.actualCost === other.props.actualCost;
    }
}
