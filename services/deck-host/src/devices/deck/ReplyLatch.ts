// services/deck-host/src/devices/deck/ReplyLatch.ts

type Settled<T> = { ok: true; value: T } | { ok: false; error: Error }

/**
 * One-shot reply slot.
 *
 * A reply may land before anyone waits for it, so the outcome is held
 * until `wait()` is called. No promise exists before that.
 */
export class ReplyLatch<T> {
    private settled: Settled<T> | null = null
    private waiter: {
        resolve: (value: T) => void
        reject: (error: Error) => void
        timer: NodeJS.Timeout | null
    } | null = null

    get isSettled(): boolean {
        return this.settled !== null
    }

    resolve(value: T): void {
        this.settle({ ok: true, value })
    }

    reject(error: Error): void {
        this.settle({ ok: false, error })
    }

    /** Waits for the outcome; rejects with `onTimeout()` after `timeoutMs` (0 = no timer). */
    wait(timeoutMs: number, onTimeout: () => Error): Promise<T> {
        const s = this.settled
        if (s) return s.ok ? Promise.resolve(s.value) : Promise.reject(s.error)
        if (this.waiter) return Promise.reject(new Error('latch already has a waiter'))

        return new Promise<T>((resolve, reject) => {
            const timer = timeoutMs > 0
                ? setTimeout(() => this.reject(onTimeout()), timeoutMs)
                : null
            this.waiter = { resolve, reject, timer }
        })
    }

    private settle(outcome: Settled<T>): void {
        if (this.settled) return
        this.settled = outcome

        const w = this.waiter
        if (!w) return
        this.waiter = null
        if (w.timer) clearTimeout(w.timer)
        if (outcome.ok) w.resolve(outcome.value)
        else w.reject(outcome.error)
    }
}
