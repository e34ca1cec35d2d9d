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
import type { LogLevel }      from "./convoflow-processor"
import * as util              from "./convoflow-util"

/*  decision of the end-of-turn analysis  */
export type EndOfTurnState = "complete" | "incomplete"

/*  phase of the turn state machine  */
export type TurnPhase = "idle" | "speaking" | "trailing-silence"

/*  result of an endpoint classification  */
export type EndpointPrediction = {
    prediction:  0 | 1
    probability: number
}

/*  injected endpoint classifier: audio samples in, decision out  */
export interface EndpointClassifier {
    predict (samples: Float32Array, sampleRate: number): EndpointPrediction | Promise<EndpointPrediction>
}

/*  turn analysis parameters  */
export type TurnParams = {
    stopSecs:        number
    preSpeechMs:     number
    maxDurationSecs: number
    singleSegment:   boolean
}
export const turnParamsDefault: TurnParams = {
    stopSecs:        3.0,
    preSpeechMs:     0,
    maxDurationSecs: 8.0,
    singleSegment:   true
}

/*  a buffered audio chunk  */
type AudioEntry = {
    time:    DateTime
    samples: Float32Array
}

/*  end-of-turn detection state machine  */
export class TurnAnalyzer extends Events.EventEmitter {
    public readonly params: TurnParams

    /*  internal state  */
    private buffer         = new Array<AudioEntry>()
    private triggered      = false
    private silenceSamples = 0
    private speechStart:   DateTime | null = null
    private _sampleRate:   number
    private classifier:    EndpointClassifier
    private clock:         () => DateTime

    constructor (options: {
        classifier:  EndpointClassifier
        sampleRate?: number
        params?:     Partial<TurnParams>
        clock?:      () => DateTime
    }) {
        super()
        const params = options.params ?? {}
        this.params = {
            stopSecs:        params.stopSecs        ?? turnParamsDefault.stopSecs,
            preSpeechMs:     params.preSpeechMs     ?? turnParamsDefault.preSpeechMs,
            maxDurationSecs: params.maxDurationSecs ?? turnParamsDefault.maxDurationSecs,
            singleSegment:   params.singleSegment   ?? turnParamsDefault.singleSegment
        }
        if (this.params.stopSecs <= 0)
            throw new Error("stop duration has to be positive")
        if (this.params.maxDurationSecs <= 0)
            throw new Error("maximum duration has to be positive")
        if (this.params.preSpeechMs < 0)
            throw new Error("pre-speech duration must not be negative")
        this._sampleRate = options.sampleRate ?? 16000
        if (this._sampleRate <= 0)
            throw new Error("sample rate has to be positive")
        this.classifier = options.classifier
        this.clock      = options.clock ?? (() => DateTime.now())
    }

    /*  emit a log message  */
    log (level: LogLevel, msg: string) {
        this.emit("log", level, msg)
    }

    /*  sample rate of the appended audio  */
    get sampleRate () {
        return this._sampleRate
    }
    set sampleRate (sampleRate: number) {
        if (sampleRate <= 0)
            throw new Error("sample rate has to be positive")
        if (sampleRate !== this._sampleRate) {
            this.clear("complete")
            this._sampleRate = sampleRate
        }
    }

    /*  introspection  */
    get speechTriggered () {
        return this.triggered
    }
    get speechStartTime () {
        return this.speechStart
    }
    get silenceMs () {
        return this.silenceSamples / (this._sampleRate / 1000)
    }
    get bufferedChunks () {
        return this.buffer.length
    }
    get bufferedSamples () {
        return this.buffer.reduce((sum, entry) => sum + entry.samples.length, 0)
    }
    get phase (): TurnPhase {
        if (!this.triggered)
            return "idle"
        return this.silenceSamples === 0 ? "speaking" : "trailing-silence"
    }

    /*  append one chunk of PCM/I16 audio and its voice activity flag  */
    appendAudio (chunk: Buffer, isSpeech: boolean): EndOfTurnState {
        const now     = this.clock()
        const samples = util.convertBufToF32(chunk)
        this.buffer.push({ time: now, samples })
        let state: EndOfTurnState = "incomplete"
        if (isSpeech) {
            this.silenceSamples = 0
            this.triggered = true
            if (this.speechStart === null) {
                this.speechStart = now
                this.log("debug", `speech started at ${now.toISO()}`)
            }
        }
        else if (this.triggered) {
            /*  count silence in samples to avoid accumulated rounding drift  */
            this.silenceSamples += samples.length
            const stopSamples = Math.round(this.params.stopSecs * this._sampleRate)
            if (this.silenceSamples >= stopSamples) {
                this.log("debug", `end of turn after ${this.silenceMs.toFixed(0)}ms of silence`)
                state = "complete"
                this.clear(state)
            }
        }
        else {
            /*  nothing before the retention window can be used once speech starts  */
            const windowMs = this.params.preSpeechMs
                + (this.params.stopSecs + this.params.maxDurationSecs) * 1000
            const cutoff = now.toMillis() - windowMs
            while (this.buffer.length > 0 && this.buffer[0].time.toMillis() < cutoff)
                this.buffer.shift()
        }
        return state
    }

    /*  on-demand end-of-turn check through the endpoint classifier  */
    async analyzeEndOfTurn (): Promise<EndOfTurnState> {
        const segment = this.segment()
        let state: EndOfTurnState = "incomplete"
        if (segment.length === 0)
            this.log("debug", "empty audio segment: skipping endpoint classification")
        else {
            const started = DateTime.now()
            const result = await util.ensurePromise(this.classifier.predict(segment, this._sampleRate))
            const elapsed = DateTime.now().diff(started).as("milliseconds")
            state = result.prediction === 1 ? "complete" : "incomplete"
            this.log("debug", `endpoint classification: ${state} ` +
                `(probability: ${result.probability.toFixed(3)}, ` +
                `samples: ${segment.length}, time: ${elapsed.toFixed(0)}ms)`)
        }
        if (state === "complete" || this.params.singleSegment)
            this.clear(state)
        return state
    }

    /*  reset the state after a decision  */
    clear (state: EndOfTurnState) {
        /*  an incomplete turn keeps waiting for the speaker  */
        this.triggered      = state === "incomplete"
        this.buffer         = []
        this.speechStart    = null
        this.silenceSamples = 0
    }

    /*  extract the speech segment, clamped to the maximum duration  */
    private segment () {
        if (this.speechStart === null)
            return new Float32Array(0)
        const startMs = this.speechStart.toMillis() - this.params.preSpeechMs
        const index   = this.buffer.findIndex((entry) => entry.time.toMillis() >= startMs)
        if (index < 0)
            return new Float32Array(0)
        const entries = this.buffer.slice(index)
        const length  = entries.reduce((sum, entry) => sum + entry.samples.length, 0)
        const segment = new Float32Array(length)
        let offset = 0
        for (const entry of entries) {
            segment.set(entry.samples, offset)
            offset += entry.samples.length
        }
        const maxSamples = Math.trunc(this.params.maxDurationSecs * this._sampleRate)
        if (segment.length > maxSamples)
            return segment.subarray(segment.length - maxSamples)
        return segment
    }
}
