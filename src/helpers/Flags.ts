export class Flags<T extends number = number> {
    protected _flags: number = 0x00000000;

    public set(mask: T): Flags<T> {
        this._flags |= mask;
        return this;
    }

    public clear(mask: T): Flags<T> {
        this._flags &= ~mask;
        return this;
    }

    public are_set(mask: T): boolean {
        return (this._flags & mask) === mask;
    }

    public are_clear(mask: T): boolean {
        return (this._flags & mask) === 0;
    }

    public get value(): number {
        return this._flags;
    }
}
