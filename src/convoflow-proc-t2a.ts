/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  internal dependencies  */
import Processor              from "./convoflow-processor"
import { type Frame, type FrameDirection, createFrame } from "./convoflow-frame"
import * as util              from "./convoflow-util"

/*  one chunk of synthesized audio  */
export type SynthesizedAudio = {
    audio:      Buffer
    sampleRate: number
    channels?:  number
}

/*  common options of text-to-speech processors  */
export type ProcessorT2AOptions = {
    aggregateSentences?: boolean
}

/*  base class for text-to-speech processors  */
export default abstract class ProcessorT2A extends Processor {
    public readonly interruptible = true

    private aggregateSentences: boolean

    /*  internal state  */
    private pendingText = ""
    private speaking = false

    constructor (id: string, opts: ProcessorT2AOptions = {}) {
        super(id)
        this.aggregateSentences = opts.aggregateSentences ?? true
    }

    /*  OVERRIDE: synthesize a text into a stream of PCM/I16 audio chunks  */
    protected abstract synthesize (text: string, signal: AbortSignal): AsyncIterable<SynthesizedAudio>

    /*  discard the response in progress  */
    async interrupt () {
        this.pendingText  = ""
        this.speaking = false
    }

    /*  close processor  */
    async close () {
        this.pendingText  = ""
        this.speaking = false
    }

    /*  handle a single frame  */
    async handle (frame: Frame, direction: FrameDirection) {
        if (direction !== "downstream") {
            await this.push(frame, direction)
            return
        }
        switch (frame.kind) {
            case "llm-response-start":
                this.pendingText = ""
                await this.push(frame, direction)
                break
            case "text":
                if (this.aggregateSentences) {
                    const { sentences, rest } = util.splitSentences(this.pendingText + frame.text)
                    this.pendingText = rest
                    for (const sentence of sentences)
                        await this.speak(sentence)
                }
                else
                    await this.speak(frame.text)
                break
            case "llm-response-end": {
                const signal = this.signal
                const rest = this.pendingText
                this.pendingText = ""
                await this.speak(rest)
                if (!signal.aborted)
                    await this.stopSpeaking()
                await this.push(frame, direction)
                break
            }
            case "speak": {
                const signal = this.signal
                await this.speak(frame.text)
                if (!signal.aborted)
                    await this.stopSpeaking()
                break
            }
            default:
                await this.push(frame, direction)
        }
    }

    /*  synthesize a single piece of text  */
    private async speak (text: string) {
        const signal = this.signal
        const input  = util.normalizeText(text)
        if (input === "" || signal.aborted)
            return
        if (!this.speaking) {
            this.speaking = true
            await this.push(createFrame("synthesis-started", {}))
        }
        this.log("info", `synthesizing "${input}"`)
        this.startTtfbMetrics()
        try {
            for await (const chunk of this.synthesize(input, signal)) {
                if (signal.aborted)
                    break
                await this.stopTtfbMetrics()
                await this.push(createFrame("synthesis-audio", {
                    audio:      chunk.audio,
                    sampleRate: chunk.sampleRate,
                    channels:   chunk.channels ?? 1
                }))
            }
        }
        catch (error: unknown) {
            if (!signal.aborted)
                throw error
        }
    }

    /*  finish the current utterance  */
    private async stopSpeaking () {
        if (!this.speaking)
            return
        this.speaking = false
        await this.push(createFrame("synthesis-stopped", {}))
    }
}
