/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  standard dependencies  */
import Events                 from "node:events"

/*  external dependencies  */
import { DateTime }           from "luxon"

/*  internal dependencies  */
import {
    type Frame, type FrameDirection, type StartParams, type MetricsData,
    createFrame, isImmediate, isInterruptible, describeFrame
}                             from "./convoflow-frame"
import type {
    EventChannel, SessionEvents
}                             from "./convoflow-events"
import * as util              from "./convoflow-util"

/*  log levels understood by the logging chain  */
export type LogLevel = "error" | "warning" | "info" | "debug"

/*  lifecycle states of a processor  */
export type ProcessorState = "created" | "running" | "paused" | "ended" | "cancelled"

/*  the receiving end of a link  */
export interface FrameReceiver {
    receive (frame: Frame, direction: FrameDirection): Promise<void>
}

/*  the base class for all processors  */
export default class Processor extends Events.EventEmitter implements FrameReceiver {
    /*  declare official processor name  */
    public static processorName = "processor"

    /*  whether an interruption discards and aborts the work of this processor  */
    public readonly interruptible: boolean = false

    /*  links and session context  */
    public upstream:   FrameReceiver | null = null
    public downstream: FrameReceiver | null = null
    public events:     EventChannel<SessionEvents> | null = null
    public params:     StartParams | null = null

    /*  internal state  */
    private queue      = new Array<{ frame: Frame, direction: FrameDirection }>()
    private draining:  Promise<void> | null = null
    private interrupted = false
    private abort      = new AbortController()
    private _state:    ProcessorState = "created"
    private metrics: {
        ttfbStart:       DateTime | null
        ttfbReported:    boolean
        processingStart: DateTime | null
    } = {
        ttfbStart:       null,
        ttfbReported:    false,
        processingStart: null
    }

    /*  the default constructor  */
    constructor (public readonly id: string) {
        super()
    }

    /*  current lifecycle state  */
    get state () {
        return this._state
    }

    /*  whether the processor reached a terminal state  */
    get finished () {
        return this._state === "ended" || this._state === "cancelled"
    }

    /*  number of frames waiting in the input queue  */
    get pending () {
        return this.queue.length
    }

    /*  abort signal of the current response generation (or of the session)  */
    protected get signal () {
        return this.abort.signal
    }

    /*  emit a log message  */
    log (level: LogLevel, msg: string, data?: unknown) {
        this.emit("log", level, msg, data)
    }

    /*  emit a session event  */
    protected notify<K extends keyof SessionEvents> (kind: K, payload: SessionEvents[K]) {
        this.events?.emit(kind, payload)
    }

    /*  receive a frame over one of the links  */
    async receive (frame: Frame, direction: FrameDirection) {
        if (this._state === "cancelled") {
            this.log("debug", `dropping ${describeFrame(frame)} after cancellation`)
            return
        }
        if (this._state === "ended") {
            /*  an ended processor still passes a cancellation through  */
            if (frame.kind === "cancel")
                await this.route(frame, direction)
            return
        }
        if (this.interrupted && isInterruptible(frame)) {
            this.log("debug", `dropping ${describeFrame(frame)} during interruption`)
            return
        }
        if (isImmediate(frame))
            await this.dispatch(frame, direction)
        else {
            this.queue.push({ frame, direction })
            this.schedule()
        }
    }

    /*  stop draining the input queue  */
    pause () {
        if (this._state === "running")
            this._state = "paused"
    }

    /*  continue draining the input queue  */
    resume () {
        if (this._state !== "paused")
            return
        this._state = "running"
        this.schedule()
    }

    /*  await the completion of the currently handled frames  */
    async settle () {
        while (this.draining !== null)
            await this.draining
    }

    /*  (re)start the queue draining loop  */
    private schedule () {
        if (this.draining !== null || this._state === "paused")
            return
        this.draining = this.drain().finally(() => {
            this.draining = null
            if (this.queue.length > 0 && !this.finished)
                this.schedule()
        })
    }

    /*  drain the input queue in FIFO order  */
    private async drain () {
        let entry: { frame: Frame, direction: FrameDirection } | undefined
        while (!this.finished
            && this._state !== "paused"
            && (entry = this.queue.shift()) !== undefined)
            await this.dispatch(entry.frame, entry.direction)
    }

    /*  process a single frame: lifecycle handling and sub-class behavior  */
    private async dispatch (frame: Frame, direction: FrameDirection) {
        const signal = this.abort.signal
        try {
            switch (frame.kind) {
                case "start":
                    this.params = frame
                    this.metrics.ttfbReported = false
                    await this.open(frame)
                    if (this._state === "created")
                        this._state = "running"
                    await this.handle(frame, direction)
                    break
                case "end":
                    await this.closeSafely("end")
                    await this.handle(frame, direction)
                    this._state = "ended"
                    this.queue = []
                    break
                case "cancel":
                    this._state = "cancelled"
                    this.queue = []
                    this.abort.abort()
                    await this.closeSafely("cancel")
                    await this.route(frame, direction)
                    break
                case "interruption-start":
                    if (this.interruptible) {
                        this.interrupted = true
                        this.queue = this.queue.filter((entry) => !isInterruptible(entry.frame))
                        this.abort.abort()
                        this.abort = new AbortController()
                        await this.interrupt()
                    }
                    await this.handle(frame, direction)
                    break
                case "interruption-end":
                    this.interrupted = false
                    await this.handle(frame, direction)
                    break
                default:
                    await this.handle(frame, direction)
            }
        }
        catch (error: unknown) {
            if (signal.aborted) {
                this.log("debug", `handling of ${describeFrame(frame)} aborted: ${util.ensureError(error).message}`)
                return
            }
            const fatal = error instanceof util.ProcessorError && error.fatal
            await this.pushError(error, fatal)
        }
    }

    /*  run the close hook without letting a failure stop the lifecycle  */
    private async closeSafely (reason: "end" | "cancel") {
        try {
            await this.close(reason)
        }
        catch (error: unknown) {
            this.log("warning", `failed to close processor: ${util.ensureError(error).message}`)
        }
    }

    /*  forward a frame over the own link in the given direction  */
    private async route (frame: Frame, direction: FrameDirection) {
        const target = direction === "downstream" ? this.downstream : this.upstream
        if (target === null) {
            this.log("warning", `no ${direction} link for ${describeFrame(frame)}`)
            return
        }
        await target.receive(frame, direction)
    }

    /*  push a frame to the neighbour processor  */
    protected async push (frame: Frame, direction: FrameDirection = "downstream") {
        if (this._state === "cancelled" || this._state === "ended") {
            this.log("debug", `not pushing ${describeFrame(frame)} after termination`)
            return
        }
        await this.route(frame, direction)
    }

    /*  report a fault upstream, and on a fatal one also terminate the processor  */
    protected async pushError (error: unknown, fatal = false) {
        const err = util.ensureError(error)
        this.log("error", `${fatal ? "fatal" : "recoverable"} error: ${err.message}`)
        await this.push(createFrame("error", { message: err.message, fatal, processor: this.id }), "upstream")
        if (fatal && !this.finished) {
            await this.closeSafely("end")
            await this.push(createFrame("end", {}), "downstream")
            this._state = "ended"
            this.queue = []
        }
    }

    /*  metrics: time to first byte  */
    protected startTtfbMetrics () {
        if (!this.params?.enableMetrics)
            return
        if (this.params.reportOnlyInitialTtfb && this.metrics.ttfbReported)
            return
        this.metrics.ttfbStart = DateTime.now()
    }
    protected async stopTtfbMetrics () {
        if (this.metrics.ttfbStart === null)
            return
        const value = DateTime.now().diff(this.metrics.ttfbStart).as("seconds")
        this.metrics.ttfbStart = null
        this.metrics.ttfbReported = true
        await this.pushMetrics({ processor: this.id, type: "ttfb", value })
    }

    /*  metrics: processing time  */
    protected startProcessingMetrics () {
        if (!this.params?.enableMetrics)
            return
        this.metrics.processingStart = DateTime.now()
    }
    protected async stopProcessingMetrics () {
        if (this.metrics.processingStart === null)
            return
        const value = DateTime.now().diff(this.metrics.processingStart).as("seconds")
        this.metrics.processingStart = null
        await this.pushMetrics({ processor: this.id, type: "processing", value })
    }
    private async pushMetrics (data: MetricsData) {
        this.log("debug", `metrics: ${data.type}=${data.value.toFixed(3)}s`)
        await this.push(createFrame("metrics", { data }), "downstream")
    }

    /*  OVERRIDE: open processor on session start  */
    async open (_params: StartParams) {}

    /*  OVERRIDE: release resources on session end or cancellation  */
    async close (_reason: "end" | "cancel") {}

    /*  OVERRIDE: discard response state on interruption  */
    async interrupt () {}

    /*  OVERRIDE: handle a single frame (default: forward it)  */
    async handle (frame: Frame, direction: FrameDirection) {
        await this.push(frame, direction)
    }
}
