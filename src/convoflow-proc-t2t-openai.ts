/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import OpenAI                 from "openai"
import { type }               from "arktype"

/*  internal dependencies  */
import ProcessorT2T           from "./convoflow-proc-t2t"
import type { ChatMessage }   from "./convoflow-frame"
import * as util              from "./convoflow-util"

/*  processor configuration parameters  */
const options = type({
    "key?":         "string",
    "api?":         /^https?:\/\/.+/,
    "model?":       "string",
    "temperature?": "0 <= number <= 2",
    "maxTokens?":   "number > 0"
})
export type ProcessorT2TOpenAIOptions = typeof options.infer

/*  processor for OpenAI chat completion  */
export default class ProcessorT2TOpenAI extends ProcessorT2T {
    /*  declare official processor name  */
    public static processorName = "t2t-openai"

    /*  create processor from configuration parameters  */
    public static create (id: string, params: object) {
        return new ProcessorT2TOpenAI(id, util.importObject(`processor <${id}>`, params, options))
    }

    /*  internal state  */
    private openai:      OpenAI | null = null
    private key:         string
    private api:         string
    private model:       string
    private temperature: number
    private maxTokens:   number

    /*  construct processor  */
    constructor (id: string, opts: ProcessorT2TOpenAIOptions = {}) {
        super(id)
        this.key         = opts.key         ?? process.env.CONVOFLOW_OPENAI_KEY ?? ""
        this.api         = opts.api         ?? "https://api.openai.com/v1"
        this.model       = opts.model       ?? "gpt-4o-mini"
        this.temperature = opts.temperature ?? 0.7
        this.maxTokens   = opts.maxTokens   ?? 512

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
        this.openai = null
    }

    /*  stream a chat completion  */
    protected async * generate (messages: readonly ChatMessage[], signal: AbortSignal) {
        if (this.openai === null)
            throw new Error("OpenAI API not opened")
        this.log("info", `OpenAI LLM: request completion for ${messages.length} messages`)
        const stream = await this.openai.chat.completions.create({
            model:       this.model,
            temperature: this.temperature,
            max_tokens:  this.maxTokens,
            stream:      true,
            messages:    messages.map((message) => ({ role: message.role, content: message.content }))
        }, { signal })
        for await (const chunk of stream) {
            const text = chunk.choices[0]?.delta?.content
            if (typeof text === "string" && text !== "")
                yield text
        }
    }
}
