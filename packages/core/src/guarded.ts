import { ScopeLockError } from './errors';

/**
 * Exclusive-access wrapper around mutable state.
 *
 * Every read or write of the wrapped value goes through {@link lock}. Sections
 * are synchronous, so one runs to completion before any other task can take
 * the lock; nested locking from inside a section is rejected.
 */
export class Guarded<T> {
    private held = false;

    constructor(private readonly value: T) {}

    get isLocked(): boolean {
        return this.held;
    }

    lock<R>(section: (value: T) => R): R {
        if (this.held) {
            throw new ScopeLockError();
        }
        this.held = true;
        try {
            return section(this.value);
        } finally {
            this.held = false;
        }
    }
}
