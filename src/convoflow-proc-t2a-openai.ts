/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import OpenAI                 from "openai"
import { type }               from "arktype"

/*  internal dependencies  */
import ProcessorT2A           from "./convoflow-proc-t2a"
import * as util              from "./convoflow-util"

/*  processor configuration parameters  */
const options = type({
    "key?":                "string",
    "api?":                /^https?:\/\/.+/,
    "voice?":              "'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer'",
    "model?":              "'tts-1' | 'tts-1-hd'",
    "speed?":              "0.25 <= number <= 4",
    "aggregateSentences?": "boolean"
})
export type ProcessorT2AOpenAIOptions = typeof options.infer

/*  OpenAI delivers raw PCM at a fixed rate  */
const openaiSampleRate = 24000

/*  processor for OpenAI text-to-speech conversion  */
export default class ProcessorT2AOpenAI extends ProcessorT2A {
    /*  declare official processor name  */
    public static processorName = "t2a-openai"

    /*  create processor from configuration parameters  */
    public static create (id: string, params: object) {
        return new ProcessorT2AOpenAI(id, util.importObject(`processor <${id}>`, params, options))
    }

    /*  internal state  */
    private openai: OpenAI | null = null
    private key:    string
    private api:    string
    private voice:  NonNullable<ProcessorT2AOpenAIOptions["voice"]>
    private model:  NonNullable<ProcessorT2AOpenAIOptions["model"]>
    private speed:  number

    /*  construct processor  */
    constructor (id: string, opts: ProcessorT2AOpenAIOptions = {}) {
        super(id, opts)
        this.key   = opts.key   ?? process.env.CONVOFLOW_OPENAI_KEY ?? ""
        this.api   = opts.api   ?? "https://api.openai.com/v1"
        this.voice = opts.voice ?? "alloy"
        this.model = opts.model ?? "tts-1"
        this.speed = opts.speed ?? 1.0

        /*  sanity check parameters  */
        if (this.key === "")
            throw new Error("OpenAI API key not configured")
    }

    /*  open processor  */
    async open () {
        this.openai = new OpenAI({
            baseURL: this.api,
            apiKey:  this.key,
            timeout: 60 * 1000
        })
    }

    /*  close processor  */
    async close () {
        await super.close()
        this.openai = null
    }

    /*  perform text-to-speech operation with OpenAI API  */
    protected async * synthesize (text: string, signal: AbortSignal) {
        if (this.openai === null)
            throw new Error("OpenAI API not opened")
        const response = await this.openai.audio.speech.create({
            model:           this.model,
            voice:           this.voice,
            input:           text,
            response_format: "pcm",
            speed:           this.speed
        }, { signal })

        /*  convert response to buffer (PCM 24kHz, 16-bit, little-endian)  */
        const buffer = Buffer.from(await response.arrayBuffer())
        this.log("info", `OpenAI TTS: received ${util.audioBufferDuration(buffer, openaiSampleRate).toFixed(2)}s of audio`)
        yield { audio: buffer, sampleRate: openaiSampleRate, channels: 1 }
    }
}
