export abstract class Entity<TProps extends object> {
    protected constructor(
        readonly id: string,
        protected props: TProps,
    ) {}

    equals(other?: Entity<TProps>): boolean {
        return other !== undefined && other.id === this.id;
    }
}
