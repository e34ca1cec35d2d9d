/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { DateTime }           from "luxon"

/*  internal dependencies  */
import Processor              from "./convoflow-processor"
import { type Frame, type FrameDirection, createFrame } from "./convoflow-frame"
import * as util              from "./convoflow-util"

/*  common options of speech-to-text processors  */
export type ProcessorA2TOptions = {
    language?:    string
    speakerId?:   string
    prerollSecs?: number
    passthrough?: boolean
}

/*  base class for segmented speech-to-text processors  */
export default abstract class ProcessorA2T extends Processor {
    protected language:    string
    protected speakerId:   string
    private   prerollSecs: number
    private   passthrough: boolean

    /*  internal state  */
    private capturing  = false
    private segment    = new Array<Buffer>()
    private preroll    = new Array<Buffer>()
    private sampleRate = 16000

    constructor (id: string, opts: ProcessorA2TOptions = {}) {
        super(id)
        this.language    = opts.language    ?? "en"
        this.speakerId   = opts.speakerId   ?? "user"
        this.prerollSecs = opts.prerollSecs ?? 0.5
        this.passthrough = opts.passthrough ?? false
    }

    /*  OVERRIDE: transcribe one segment of PCM/I16 mono audio  */
    protected abstract transcribe (audio: Buffer, sampleRate: number, signal: AbortSignal): Promise<string>

    /*  close processor  */
    async close () {
        this.capturing = false
        this.segment   = []
        this.preroll   = []
    }

    /*  handle a single frame  */
    async handle (frame: Frame, direction: FrameDirection) {
        if (direction !== "downstream") {
            await this.push(frame, direction)
            return
        }
        switch (frame.kind) {
            case "audio-raw":
                this.sampleRate = frame.sampleRate
                if (this.capturing)
                    this.segment.push(frame.audio)
                else
                    this.keepPreroll(frame.audio)
                if (this.passthrough)
                    await this.push(frame, direction)
                break
            case "user-started-speaking":
                this.capturing = true
                this.segment   = this.preroll
                this.preroll   = []
                await this.push(frame, direction)
                break
            case "user-stopped-speaking": {
                this.capturing = false
                const audio = Buffer.concat(this.segment)
                this.segment = []
                try {
                    if (audio.length > 0)
                        await this.transcribeSegment(audio)
                }
                finally {
                    await this.push(frame, direction)
                }
                break
            }
            default:
                await this.push(frame, direction)
        }
    }

    /*  retain the most recent audio ahead of the speech onset  */
    private keepPreroll (audio: Buffer) {
        this.preroll.push(audio)
        const maxBytes = Math.round(this.prerollSecs * this.sampleRate) * 2
        let bytes = this.preroll.reduce((sum, chunk) => sum + chunk.length, 0)
        while (this.preroll.length > 0 && bytes - this.preroll[0].length >= maxBytes) {
            bytes -= this.preroll[0].length
            this.preroll.shift()
        }
    }

    /*  transcribe a captured segment and emit the transcript  */
    private async transcribeSegment (audio: Buffer) {
        const signal   = this.signal
        const spokenAt = DateTime.now().minus({
            seconds: util.audioBufferDuration(audio, this.sampleRate)
        })
        this.log("info", `transcribing ${util.audioBufferDuration(audio, this.sampleRate).toFixed(2)}s of audio`)
        this.startTtfbMetrics()
        this.startProcessingMetrics()
        const text = await this.transcribe(audio, this.sampleRate, signal)
        await this.stopTtfbMetrics()
        await this.stopProcessingMetrics()
        if (signal.aborted)
            return
        const normalized = util.normalizeText(text)
        if (normalized === "") {
            this.log("info", "empty transcript")
            return
        }
        this.log("info", `transcript: "${normalized}"`)
        await this.push(createFrame("transcript", {
            text:      normalized,
            speakerId: this.speakerId,
            spokenAt,
            language:  this.language
        }))
    }
}
