/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { type }               from "arktype"

/*  internal dependencies  */
import Processor              from "./convoflow-processor"
import { type Frame, type FrameDirection, type ChatMessage, createFrame } from "./convoflow-frame"
import * as util              from "./convoflow-util"

/*  processor configuration parameters  */
const options = type({
    "system?":      "string",
    "maxMessages?": "number >= 2"
})
export type ProcessorT2TContextOptions = typeof options.infer

/*  processor for aggregating the conversation context  */
export default class ProcessorT2TContext extends Processor {
    /*  declare official processor name  */
    public static processorName = "t2t-context"

    /*  create processor from configuration parameters  */
    public static create (id: string, params: object) {
        return new ProcessorT2TContext(id, util.importObject(`processor <${id}>`, params, options))
    }

    /*  internal state  */
    private system:      string
    private maxMessages: number
    private history      = new Array<ChatMessage>()
    private pendingTexts = new Array<string>()

    /*  construct processor  */
    constructor (id: string, opts: ProcessorT2TContextOptions = {}) {
        super(id)
        this.system      = opts.system      ?? "You are a helpful voice assistant. Answer briefly."
        this.maxMessages = opts.maxMessages ?? 40
    }

    /*  the current conversation context  */
    get messages (): readonly ChatMessage[] {
        return [ { role: "system", content: this.system }, ...this.history ]
    }

    /*  handle a single frame  */
    async handle (frame: Frame, direction: FrameDirection) {
        switch (frame.kind) {
            case "transcript":
                this.pendingTexts.push(frame.text)
                break
            case "llm-messages-append":
                for (const message of frame.messages)
                    this.append(message)
                break
            case "response-trigger":
                await this.respond()
                break
            case "assistant-reply":
                if (frame.text.trim() !== "")
                    this.append({ role: "assistant", content: frame.text.trim() })
                if (frame.interrupted)
                    this.log("info", "assistant reply was interrupted")
                break
            default:
                await this.push(frame, direction)
        }
    }

    /*  request a response for the pending user utterances
        or for messages appended since the last assistant reply  */
    private async respond () {
        if (this.pendingTexts.length > 0) {
            this.append({ role: "user", content: this.pendingTexts.join(" ") })
            this.pendingTexts = []
        }
        else if (this.history.length === 0 || this.history[this.history.length - 1].role === "assistant") {
            this.log("debug", "response trigger without new user utterance")
            return
        }
        await this.push(createFrame("llm-context", { messages: this.messages }))
    }

    /*  append a message, keeping the history bounded  */
    private append (message: ChatMessage) {
        this.history.push(message)
        while (this.history.length > this.maxMessages)
            this.history.shift()
    }
}
