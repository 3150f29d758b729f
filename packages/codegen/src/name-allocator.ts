/**
 * Issues identifiers for generated local bindings. Names are unique within one allocator only;
 * each session emits its code into its own scope.
 */
export class NameAllocator {
    private counter = 0;

    fresh(prefix: string): string {
        return `${prefix}$${this.counter++}`;
    }

    get allocated() {
        return this.counter;
    }
}
