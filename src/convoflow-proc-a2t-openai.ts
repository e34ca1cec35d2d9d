/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import OpenAI, { toFile }     from "openai"
import { type }               from "arktype"

/*  internal dependencies  */
import ProcessorA2T           from "./convoflow-proc-a2t"
import * as util              from "./convoflow-util"

/*  processor configuration parameters  */
const options = type({
    "key?":         "string",
    "api?":         /^https?:\/\/.+/,
    "model?":       "string",
    "language?":    /^[a-z]{2}$/,
    "prerollSecs?": "number >= 0",
    "passthrough?": "boolean"
})
export type ProcessorA2TOpenAIOptions = typeof options.infer

/*  processor for OpenAI speech-to-text conversion  */
export default class ProcessorA2TOpenAI extends ProcessorA2T {
    /*  declare official processor name  */
    public static processorName = "a2t-openai"

    /*  create processor from configuration parameters  */
    public static create (id: string, params: object) {
        return new ProcessorA2TOpenAI(id, util.importObject(`processor <${id}>`, params, options))
    }

    /*  internal state  */
    private openai: OpenAI | null = null
    private key:    string
    private api:    string
    private model:  string

    /*  construct processor  */
    constructor (id: string, opts: ProcessorA2TOpenAIOptions = {}) {
        super(id, opts)
        this.key   = opts.key   ?? process.env.CONVOFLOW_OPENAI_KEY ?? ""
        this.api   = opts.api   ?? "https://api.openai.com/v1"
        this.model = opts.model ?? "gpt-4o-mini-transcribe"

        /*  sanity check parameters  */
        if (this.key === "")
            throw new Error("OpenAI API key not configured")
    }

    /*  open processor  */
    async open () {
        this.openai = new OpenAI({
            baseURL: this.api,
            apiKey:  this.key,
            timeout: 30 * 1000
        })
    }

    /*  close processor  */
    async close () {
        await super.close()
        this.openai = null
    }

    /*  transcribe one segment through the OpenAI API  */
    protected async transcribe (audio: Buffer, sampleRate: number, signal: AbortSignal) {
        if (this.openai === null)
            throw new Error("OpenAI API not opened")
        const wav  = Buffer.concat([ util.writeWavHeader(audio.length, { sampleRate }), audio ])
        const file = await toFile(wav, "speech.wav", { type: "audio/wav" })
        this.log("info", `OpenAI STT: send ${wav.length} bytes of audio`)
        const result = await this.openai.audio.transcriptions.create({
            file,
            model:    this.model,
            language: this.language
        }, { signal })
        return result.text
    }
}
