/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { type }               from "arktype"

/*  internal dependencies  */
import Processor, { type LogLevel } from "./convoflow-processor"
import { type Frame, type FrameDirection, type FrameKind, describeFrame } from "./convoflow-frame"
import * as util              from "./convoflow-util"

/*  processor configuration parameters  */
const options = type({
    "name?":  "string",
    "level?": "'error' | 'warning' | 'info' | 'debug'",
    "kinds?": "string[]",
    "audio?": "boolean"
})
export type ProcessorX2XTraceOptions = typeof options.infer

/*  processor for data flow tracing  */
export default class ProcessorX2XTrace extends Processor {
    /*  declare official processor name  */
    public static processorName = "x2x-trace"

    /*  create processor from configuration parameters  */
    public static create (id: string, params: object) {
        return new ProcessorX2XTrace(id, util.importObject(`processor <${id}>`, params, options))
    }

    /*  internal state  */
    private name:  string
    private level: LogLevel
    private kinds: Set<string> | null
    private audio: boolean
    public  count  = 0

    /*  construct processor  */
    constructor (id: string, opts: ProcessorX2XTraceOptions = {}) {
        super(id)
        this.name  = opts.name  ?? "trace"
        this.level = opts.level ?? "info"
        this.kinds = opts.kinds !== undefined ? new Set(opts.kinds) : null
        this.audio = opts.audio ?? false
    }

    /*  whether a frame of a kind is traced  */
    traces (kind: FrameKind) {
        if (this.kinds !== null)
            return this.kinds.has(kind)
        if (!this.audio)
            return kind !== "audio-raw" && kind !== "synthesis-audio"
        return true
    }

    /*  handle a single frame  */
    async handle (frame: Frame, direction: FrameDirection) {
        if (this.traces(frame.kind)) {
            this.count++
            this.log(this.level, `[${this.name}]: ${direction === "downstream" ? "-->" : "<--"} ${describeFrame(frame)}`)
        }
        await this.push(frame, direction)
    }
}
