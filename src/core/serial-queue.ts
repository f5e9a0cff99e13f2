/**
 * FIFO queue that runs one task at a time. Every ledger read-modify-write and
 * every presence mutation goes through the same instance.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve()
    private pending = 0

    run<T>(task: () => Promise<T>): Promise<T> {
        this.pending++
        const result = this.tail.then(task)
        this.tail = result.then(
            () => this.settle(),
            () => this.settle()
        )
        return result
    }

    /** Tasks queued or running. */
    get size(): number {
        return this.pending
    }

    /** Resolves once every task queued so far has settled. */
    async drain(): Promise<void> {
        await this.tail
    }

    private settle(): void {
        this.pending--
    }
}
