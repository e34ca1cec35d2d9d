/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { DateTime }           from "luxon"

/*  internal dependencies  */
import type { MetricsData }   from "./convoflow-frame"
import * as util              from "./convoflow-util"

/*  events of a conversation session  */
export interface SessionEvents {
    "pipeline-started":    { task: string }
    "pipeline-finished":   { task: string, cancelled: boolean }
    "client-connected":    { client: string }
    "client-disconnected": { client: string }
    "speech-started":      { timestamp: DateTime }
    "speech-ended":        { timestamp: DateTime }
    "idle-timeout":        { idleSecs: number }
    "error":               { message: string, fatal: boolean, processor: string }
    "metrics":             MetricsData
}

export type EventHandler<P> = (payload: P) => void | Promise<void>
type Subscribers<E> = { [ K in keyof E ]?: Set<EventHandler<E[K]>> }

/*  ordered, at-most-once notification channel per event kind  */
export class EventChannel<E> {
    private subscribers: Subscribers<E> = {}
    private delivery = Promise.resolve()

    constructor (private onError: (error: Error) => void = () => {}) {}

    /*  subscribe to an event kind  */
    subscribe<K extends keyof E> (kind: K, handler: EventHandler<E[K]>) {
        const handlers = this.subscribers[kind] ?? new Set<EventHandler<E[K]>>()
        this.subscribers[kind] = handlers
        handlers.add(handler)
        return () => {
            handlers.delete(handler)
        }
    }

    /*  emit an event to all current subscribers  */
    emit<K extends keyof E> (kind: K, payload: E[K]) {
        const handlers = Array.from(this.subscribers[kind] ?? [])
        if (handlers.length === 0)
            return
        this.delivery = this.delivery.then(async () => {
            for (const handler of handlers) {
                if (!this.subscribers[kind]?.has(handler))
                    continue
                try {
                    await handler(payload)
                }
                catch (error: unknown) {
                    this.onError(util.ensureError(error, `event handler for "${String(kind)}"`))
                }
            }
        })
    }

    /*  number of subscribers of an event kind  */
    subscriptions (kind: keyof E) {
        return this.subscribers[kind]?.size ?? 0
    }

    /*  await delivery of all emitted events  */
    async flush () {
        await this.delivery
    }
}
