/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  standard dependencies  */
import Events                 from "node:events"

/*  internal dependencies  */
import { type Frame, createFrame, describeFrame } from "./convoflow-frame"
import { EventChannel, type SessionEvents }       from "./convoflow-events"
import Pipeline                                    from "./convoflow-pipeline"
import type Processor                              from "./convoflow-processor"
import type { FrameReceiver, LogLevel }            from "./convoflow-processor"
import * as util                                   from "./convoflow-util"

/*  task parameters  */
export type TaskParams = {
    allowInterruptions:    boolean
    enableMetrics:         boolean
    reportOnlyInitialTtfb: boolean
    idleTimeoutSecs:       number | null
    sampleRate:            number
    outputSampleRate:      number
    session:               Record<string, string | number | boolean>
}
export const taskParamsDefault: TaskParams = {
    allowInterruptions:    true,
    enableMetrics:         false,
    reportOnlyInitialTtfb: false,
    idleTimeoutSecs:       300,
    sampleRate:            16000,
    outputSampleRate:      24000,
    session:               {}
}

/*  grace period for in-flight frame handlers on termination  */
const settleTimeout = 5 * 1000

let taskCounter = 0

/*  owner of one running pipeline instance  */
export default class Task extends Events.EventEmitter {
    public  readonly id:     string
    public  readonly params: TaskParams
    public  readonly events: EventChannel<SessionEvents>

    /*  internal state  */
    private inbox           = new Array<Frame>()
    private wakeup:         (() => void) | null = null
    private running         = false
    private terminated      = false
    private cancelled       = false
    private cancellation:   Promise<void> | null = null
    private interruption:   Promise<void> | null = null
    private idleTimer:      ReturnType<typeof setTimeout> | null = null
    private responseInFlight = false
    private synthesizing    = false
    private background:     util.PromiseSet
    private relays          = new Map<Processor, (level: LogLevel, msg: string) => void>()
    private source:         FrameReceiver
    private sink:           FrameReceiver

    constructor (public readonly pipeline: Pipeline, params: Partial<TaskParams> = {}, id?: string) {
        super()
        this.id     = id ?? `task-${++taskCounter}`
        this.params = {
            allowInterruptions:    params.allowInterruptions    ?? taskParamsDefault.allowInterruptions,
            enableMetrics:         params.enableMetrics         ?? taskParamsDefault.enableMetrics,
            reportOnlyInitialTtfb: params.reportOnlyInitialTtfb ?? taskParamsDefault.reportOnlyInitialTtfb,
            idleTimeoutSecs:       params.idleTimeoutSecs !== undefined ?
                params.idleTimeoutSecs : taskParamsDefault.idleTimeoutSecs,
            sampleRate:            params.sampleRate            ?? taskParamsDefault.sampleRate,
            outputSampleRate:      params.outputSampleRate      ?? taskParamsDefault.outputSampleRate,
            session:               params.session               ?? taskParamsDefault.session
        }
        if (this.params.idleTimeoutSecs !== null && this.params.idleTimeoutSecs <= 0)
            throw new Error("idle timeout has to be positive")
        this.events = new EventChannel<SessionEvents>((error) => {
            this.log("warning", error.message)
        })
        this.background = new util.PromiseSet((error) => {
            this.log("error", error.message)
        })
        this.source = { receive: (frame) => this.fromSource(frame) }
        this.sink   = { receive: (frame) => this.fromSink(frame) }
    }

    /*  emit a log message  */
    log (level: LogLevel, msg: string) {
        this.emit("log", level, `task <${this.id}>: ${msg}`)
    }

    /*  whether cancellation was requested  */
    get isCancelled () {
        return this.cancelled
    }

    /*  whether the task reached its terminal state  */
    get hasFinished () {
        return this.terminated || this.cancelled
    }

    /*  whether a system response is currently in flight  */
    get isResponding () {
        return this.responseInFlight
    }

    /*  enqueue a single frame  */
    queueFrame (frame: Frame) {
        this.queueFrames([ frame ])
    }

    /*  enqueue an ordered sequence of frames atomically  */
    queueFrames (frames: Iterable<Frame>) {
        if (this.hasFinished)
            throw new Error(`task <${this.id}> already finished`)
        this.inbox.push(...frames)
        this.wake()
    }

    /*  drive the pipeline until it terminates  */
    async run () {
        if (this.cancelled && !this.running) {
            this.log("info", "cancelled before start")
            return
        }
        if (this.running || this.terminated)
            throw new Error(`task <${this.id}> cannot be run more than once`)
        this.running = true
        this.pipeline.attach(this.source, this.sink)
        for (const processor of this.pipeline.processors) {
            const relay = (level: LogLevel, msg: string) => {
                this.emit("log", level, `processor <${processor.id}>: ${msg}`)
            }
            processor.on("log", relay)
            this.relays.set(processor, relay)
            processor.events = this.events
        }
        this.log("info", "starting pipeline")
        this.events.emit("pipeline-started", { task: this.id })
        try {
            this.touch()
            await this.deliver(createFrame("start", {
                sampleRate:            this.params.sampleRate,
                outputSampleRate:      this.params.outputSampleRate,
                allowInterruptions:    this.params.allowInterruptions,
                enableMetrics:         this.params.enableMetrics,
                reportOnlyInitialTtfb: this.params.reportOnlyInitialTtfb,
                session:               { ...this.params.session }
            }))
            while (!this.terminated) {
                const frame = this.inbox.shift()
                if (frame === undefined) {
                    await new Promise<void>((resolve) => { this.wakeup = resolve })
                    continue
                }
                await this.deliver(frame)
            }
        }
        finally {
            await this.finish()
        }
    }

    /*  tear down after termination  */
    private async finish () {
        this.terminated = true
        this.clearIdleTimer()
        if (this.cancellation !== null)
            await this.cancellation
        await this.background.awaitAll()

        /*  processors upstream of a fatally failed one are still alive  */
        if (this.pipeline.processors.some((processor) => !processor.finished)) {
            this.log("info", "cancelling remaining processors")
            await this.deliver(createFrame("cancel", { reason: "pipeline terminated" }))
        }
        for (const processor of this.pipeline.processors) {
            await util.awaitWithTimeout(processor.settle(), settleTimeout,
                `processor <${processor.id}> did not settle`).catch((error: unknown) => {
                this.log("warning", util.ensureError(error).message)
            })
        }

        /*  detach from processors  */
        for (const [ processor, relay ] of this.relays) {
            processor.removeListener("log", relay)
            processor.events = null
        }
        this.relays.clear()
        this.pipeline.detach()
        this.inbox = []
        this.log("info", `pipeline finished${this.cancelled ? " (cancelled)" : ""}`)
        this.events.emit("pipeline-finished", { task: this.id, cancelled: this.cancelled })
        await this.events.flush()
    }

    /*  cancel the task, pre-empting all not yet delivered frames  */
    async cancel (reason = "task cancelled") {
        if (!this.cancelled) {
            this.cancelled = true
            this.inbox = []
            if (this.running && !this.terminated) {
                this.log("info", `cancelling (${reason})`)
                this.cancellation = this.deliver(createFrame("cancel", { reason }))
                    .then(() => { this.terminate() })
            }
            else
                this.terminate()
        }
        if (this.cancellation !== null)
            await this.cancellation
    }

    /*  interrupt the in-flight response (last-writer-wins):
        the interruption-start frame travels upstream from the output boundary,
        and once every processor observed it, the task sends the interruption-end
        frame from the input boundary on behalf of the interrupted processors,
        which each forward it downstream  */
    async interrupt () {
        if (!this.running || this.terminated || this.cancelled)
            return
        if (this.interruption !== null)
            return this.interruption
        this.interruption = (async () => {
            this.log("info", "interrupting in-flight response")
            await this.pipeline.last.receive(createFrame("interruption-start", {}), "upstream")
            await this.pipeline.first.receive(createFrame("interruption-end", {}), "downstream")
            this.responseInFlight = false
            this.synthesizing     = false
        })().finally(() => {
            this.interruption = null
        })
        return this.interruption
    }

    /*  deliver a frame at the input boundary  */
    private async deliver (frame: Frame) {
        this.touch()
        await this.pipeline.first.receive(frame, "downstream")
    }

    /*  mark the task as terminated and wake up the run loop  */
    private terminate () {
        this.terminated = true
        this.clearIdleTimer()
        this.wake()
    }
    private wake () {
        const wakeup = this.wakeup
        this.wakeup = null
        if (wakeup !== null)
            wakeup()
    }

    /*  idle watchdog: reset on every observed frame  */
    private touch () {
        const idleTimeoutSecs = this.params.idleTimeoutSecs
        if (idleTimeoutSecs === null || !this.running || this.terminated || this.cancelled)
            return
        this.clearIdleTimer()
        this.idleTimer = setTimeout(() => {
            this.idleTimer = null
            this.log("warning", `no frame observed for ${idleTimeoutSecs}s`)
            this.events.emit("idle-timeout", { idleSecs: idleTimeoutSecs })
            this.background.add(this.cancel("idle timeout"))
        }, idleTimeoutSecs * 1000)
    }
    private clearIdleTimer () {
        if (this.idleTimer !== null) {
            clearTimeout(this.idleTimer)
            this.idleTimer = null
        }
    }

    /*  frames leaving the pipeline at its input boundary  */
    private async fromSource (frame: Frame) {
        this.touch()
        switch (frame.kind) {
            case "error":
                this.log(frame.fatal ? "error" : "warning",
                    `processor <${frame.processor}> reported: ${frame.message}`)
                this.events.emit("error", {
                    message: frame.message, fatal: frame.fatal, processor: frame.processor
                })
                if (this.pipeline.processors.some((processor) =>
                    processor.id === frame.processor && processor.interruptible)) {
                    /*  a failed response producer ends the response  */
                    this.responseInFlight = false
                    this.synthesizing     = false
                }
                break
            case "user-started-speaking":
                this.events.emit("speech-started", { timestamp: frame.timestamp })
                if (this.params.allowInterruptions && this.responseInFlight)
                    this.background.add(this.interrupt())
                break
            case "user-stopped-speaking":
                this.events.emit("speech-ended", { timestamp: frame.timestamp })
                break
            default:
                this.log("debug", `ignoring ${describeFrame(frame)} at input boundary`)
        }
    }

    /*  frames leaving the pipeline at its output boundary  */
    private async fromSink (frame: Frame) {
        this.touch()
        switch (frame.kind) {
            case "end":
                this.log("info", "end frame passed the pipeline")
                this.terminate()
                break
            case "cancel":
                this.terminate()
                break
            case "llm-response-start":
                this.responseInFlight = true
                break
            case "llm-response-end":
                if (!this.synthesizing)
                    this.responseInFlight = false
                break
            case "synthesis-started":
                this.synthesizing     = true
                this.responseInFlight = true
                break
            case "synthesis-stopped":
                this.synthesizing     = false
                this.responseInFlight = false
                break
            case "metrics":
                this.events.emit("metrics", frame.data)
                break
            case "error":
                this.events.emit("error", {
                    message: frame.message, fatal: frame.fatal, processor: frame.processor
                })
                break
            default:
                break
        }
    }
}
