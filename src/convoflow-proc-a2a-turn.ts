/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { type }               from "arktype"
import type { DateTime }      from "luxon"

/*  internal dependencies  */
import Processor, { type LogLevel }        from "./convoflow-processor"
import { type Frame, type FrameDirection, createFrame } from "./convoflow-frame"
import { TurnAnalyzer, type EndpointClassifier } from "./convoflow-turn"
import { EnergyEndpointClassifier }        from "./convoflow-turn-energy"
import * as util                           from "./convoflow-util"

/*  processor configuration parameters  */
const options = type({
    "stopSecs?":         "number > 0",
    "preSpeechMs?":      "number >= 0",
    "maxDurationSecs?":  "number > 0",
    "analyzeAfterSecs?": "number >= 0",
    "singleSegment?":    "boolean",
    "vadThresholdDb?":   "number < 0"
})
export type ProcessorA2ATurnOptions = typeof options.infer & {
    classifier?: EndpointClassifier
    clock?:      () => DateTime
}

/*  processor for voice activity and end-of-turn detection  */
export default class ProcessorA2ATurn extends Processor {
    /*  declare official processor name  */
    public static processorName = "a2a-turn"

    /*  create processor from configuration parameters  */
    public static create (id: string, params: object) {
        return new ProcessorA2ATurn(id, util.importObject(`processor <${id}>`, params, options))
    }

    /*  internal state  */
    public  readonly analyzer: TurnAnalyzer
    private analyzeAfterSecs:  number
    private vadThresholdDb:    number
    private userSpeaking       = false
    private analyzed           = false

    /*  construct processor  */
    constructor (id: string, opts: ProcessorA2ATurnOptions = {}) {
        super(id)
        this.analyzeAfterSecs = opts.analyzeAfterSecs ?? 0.8
        this.vadThresholdDb   = opts.vadThresholdDb   ?? -45
        this.analyzer = new TurnAnalyzer({
            classifier: opts.classifier ?? new EnergyEndpointClassifier(),
            clock:      opts.clock,
            params: {
                stopSecs:        opts.stopSecs,
                preSpeechMs:     opts.preSpeechMs,
                maxDurationSecs: opts.maxDurationSecs,
                singleSegment:   opts.singleSegment
            }
        })
        this.analyzer.on("log", (level: LogLevel, msg: string) => {
            this.log(level, msg)
        })
        if (this.analyzeAfterSecs >= this.analyzer.params.stopSecs)
            this.log("warning", "analysis delay exceeds stop duration: endpoint classifier never consulted")
    }

    /*  open processor  */
    async open () {
        this.userSpeaking = false
        this.analyzed     = false
        if (this.params !== null)
            this.analyzer.sampleRate = this.params.sampleRate
    }

    /*  close processor  */
    async close () {
        this.analyzer.clear("complete")
        this.userSpeaking = false
    }

    /*  handle a single frame  */
    async handle (frame: Frame, direction: FrameDirection) {
        await this.push(frame, direction)
        if (frame.kind !== "audio-raw" || direction !== "downstream")
            return
        if (frame.channels !== 1)
            throw new Error(`turn detection requires mono audio (got ${frame.channels} channels)`)
        if (frame.sampleRate !== this.analyzer.sampleRate)
            this.analyzer.sampleRate = frame.sampleRate

        /*  feed the analyzer  */
        const isSpeech = frame.isSpeech ?? util.audioLevel(frame.audio) > this.vadThresholdDb
        const state = this.analyzer.appendAudio(frame.audio, isSpeech)
        if (isSpeech) {
            this.analyzed = false
            if (!this.userSpeaking) {
                this.userSpeaking = true
                this.log("info", "user started speaking")
                const started = createFrame("user-started-speaking", {})
                await this.push(started, "downstream")
                await this.push(started, "upstream")
            }
        }

        /*  the silence timeout takes priority over the classifier  */
        if (state === "complete")
            await this.endOfTurn("silence timeout")
        else if (!isSpeech
            && this.userSpeaking
            && !this.analyzed
            && this.analyzer.silenceMs >= this.analyzeAfterSecs * 1000) {
            this.analyzed = true
            if (await this.analyzer.analyzeEndOfTurn() === "complete")
                await this.endOfTurn("endpoint classification")
        }
    }

    /*  announce the end of the user turn  */
    private async endOfTurn (cause: string) {
        if (!this.userSpeaking)
            return
        this.userSpeaking = false
        this.log("info", `user stopped speaking (${cause})`)
        const stopped = createFrame("user-stopped-speaking", {})
        await this.push(stopped, "downstream")
        await this.push(stopped, "upstream")
        await this.push(createFrame("response-trigger", {}), "downstream")
    }
}
