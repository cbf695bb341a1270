import { randomInt, timingSafeEqual } from 'crypto';
import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface AccessCodeProps {
    readonly value: string;
}

/** Six-digit gate code handed to the driver when the booking is created. */
export class AccessCode extends ValueObject<AccessCodeProps> {
    private static readonly PATTERN = /^\d{6}$/;

    private constructor(props: AccessCodeProps) {
        super(props);
    }

    get value(): string {
        return this.props.value;
    }

    static generate(): AccessCode {
        return new AccessCode({ value: randomInt(0, 1_000_000).toString().padStart(6, '0') });
    }

    static create(value: string): AccessCode {
        if (!AccessCode.PATTERN.test(value)) {
            throw new Error('Access code must be exactly six digits');
        }
        return new AccessCode({ value });
    }

    /** Constant-time comparison against a code typed at the gate. */
    matches(candidate: string): boolean {
        const expected = Buffer.from(this.props.value);
        const given = Buffer.from(candidate);
        return expected.length === given.length && timingSafeEqual(expected, given);
    }

    protected equalsCore(other: AccessCode): boolean {
        return this.props.value === other.props.value;
    }
}
