/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  internal dependencies  */
import { ensureError }        from "./convoflow-util-error"

/*  helper class for tracking background promises  */
export class PromiseSet {
    private promises = new Set<Promise<void>>()
    constructor (private onError: (error: Error) => void) {}
    add (promise: Promise<void>) {
        const tracked: Promise<void> = promise
            .catch((error: unknown) => {
                this.onError(ensureError(error))
            })
            .finally(() => {
                this.promises.delete(tracked)
            })
        this.promises.add(tracked)
    }
    get size () {
        return this.promises.size
    }
    async awaitAll () {
        while (this.promises.size > 0)
            await Promise.all(Array.from(this.promises))
    }
}
