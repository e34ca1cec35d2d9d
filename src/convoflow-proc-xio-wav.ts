/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  standard dependencies  */
import fs                     from "node:fs"

/*  external dependencies  */
import { type }               from "arktype"

/*  internal dependencies  */
import Processor              from "./convoflow-processor"
import type { Frame, FrameDirection } from "./convoflow-frame"
import * as util              from "./convoflow-util"

/*  processor configuration parameters  */
const options = type({
    file:           "string",
    "passthrough?": "boolean"
})
export type ProcessorXIOWavOptions = typeof options.infer

/*  processor for writing synthesized audio into a WAV file  */
export default class ProcessorXIOWav extends Processor {
    /*  declare official processor name  */
    public static processorName = "xio-wav"

    /*  create processor from configuration parameters  */
    public static create (id: string, params: object) {
        return new ProcessorXIOWav(id, util.importObject(`processor <${id}>`, params, options))
    }

    /*  internal state  */
    private file:        string
    private passthrough: boolean
    private chunks       = new Array<Buffer>()
    private sampleRate:  number | null = null
    private channels     = 1

    /*  construct processor  */
    constructor (id: string, opts: ProcessorXIOWavOptions) {
        super(id)
        this.file        = opts.file
        this.passthrough = opts.passthrough ?? true
        if (this.file === "")
            throw new Error("output file name required")
    }

    /*  open processor  */
    async open () {
        this.chunks     = []
        this.sampleRate = null
    }

    /*  close processor: write out the collected audio  */
    async close () {
        const audio = Buffer.concat(this.chunks)
        this.chunks = []
        const header = util.writeWavHeader(audio.length, {
            sampleRate: this.sampleRate ?? this.params?.outputSampleRate ?? 24000,
            channels:   this.channels
        })
        await fs.promises.writeFile(this.file, Buffer.concat([ header, audio ]))
        this.log("info", `wrote ${audio.length} bytes of audio to "${this.file}"`)
    }

    /*  handle a single frame  */
    async handle (frame: Frame, direction: FrameDirection) {
        if (frame.kind === "synthesis-audio" && direction === "downstream") {
            if (this.sampleRate === null) {
                this.sampleRate = frame.sampleRate
                this.channels   = frame.channels
            }
            else if (frame.sampleRate !== this.sampleRate || frame.channels !== this.channels)
                throw new Error(`audio format changed to ${frame.sampleRate} Hz / ${frame.channels} channels`)
            this.chunks.push(frame.audio)
            if (!this.passthrough)
                return
        }
        await this.push(frame, direction)
    }
}
