/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  internal dependencies  */
import Processor              from "./convoflow-processor"
import { type Frame, type FrameDirection, type ChatMessage, createFrame } from "./convoflow-frame"

/*  base class for streaming language-model inference processors  */
export default abstract class ProcessorT2T extends Processor {
    public readonly interruptible = true

    /*  OVERRIDE: generate a response as a stream of text fragments  */
    protected abstract generate (messages: readonly ChatMessage[], signal: AbortSignal): AsyncIterable<string>

    /*  handle a single frame  */
    async handle (frame: Frame, direction: FrameDirection) {
        if (frame.kind === "llm-context" && direction === "downstream")
            await this.respond(frame.messages)
        else
            await this.push(frame, direction)
    }

    /*  stream one response downstream  */
    private async respond (messages: readonly ChatMessage[]) {
        const signal = this.signal
        const reply  = new Array<string>()
        await this.push(createFrame("llm-response-start", {}))
        this.startTtfbMetrics()
        this.startProcessingMetrics()
        try {
            for await (const text of this.generate(messages, signal)) {
                if (signal.aborted)
                    break
                if (reply.length === 0)
                    await this.stopTtfbMetrics()
                reply.push(text)
                await this.push(createFrame("text", { text }))
            }
        }
        catch (error: unknown) {
            if (!signal.aborted)
                throw error
        }
        await this.stopProcessingMetrics()

        /*  report the (possibly partial) reply back to the context  */
        const interrupted = signal.aborted
        if (!interrupted)
            await this.push(createFrame("llm-response-end", {}))
        await this.push(createFrame("assistant-reply", { text: reply.join(""), interrupted }), "upstream")
    }
}
