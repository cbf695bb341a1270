export abstract class ValueObject<TProps extends object> {
    protected readonly props: Readonly<TProps>;

    protected constructor(props: TProps) {
        this.props = Object.freeze({ ...props });
    }

    equals(other?: ValueObject<TProps>): boolean {
        if (other === undefined) {
            return false;
        }
        if (other === this) {
            return true;
        }
        if (other.constructor !== this.constructor) {
            return false;
        }
        return this.equalsCore(other);
    }

    protected abstract equalsCore(other: ValueObject<TProps>): boolean;
}
