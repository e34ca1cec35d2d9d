/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  internal dependencies  */
import Processor, { type FrameReceiver } from "./convoflow-processor"

/*  processors already linked into a pipeline  */
const linked = new WeakSet<Processor>()

/*  fixed, linear chain of processors  */
export default class Pipeline {
    public readonly processors: readonly Processor[]

    /*  construct pipeline by linking the processors in order  */
    constructor (processors: Processor[]) {
        if (processors.length === 0)
            throw new Error("pipeline requires at least one processor")
        const seen = new Set<Processor>()
        const ids  = new Set<string>()
        for (const processor of processors) {
            if (seen.has(processor))
                throw new Error(`processor <${processor.id}> occurs more than once (cyclic chain)`)
            if (ids.has(processor.id))
                throw new Error(`processor id <${processor.id}> is not unique`)
            if (linked.has(processor))
                throw new Error(`processor <${processor.id}> is already linked into another pipeline`)
            seen.add(processor)
            ids.add(processor.id)
        }
        for (let i = 0; i < processors.length; i++) {
            processors[i].upstream   = i > 0 ? processors[i - 1] : null
            processors[i].downstream = i < processors.length - 1 ? processors[i + 1] : null
            linked.add(processors[i])
        }
        this.processors = Object.freeze([ ...processors ])
    }

    /*  the processor at the input boundary  */
    get first () {
        return this.processors[0]
    }

    /*  the processor at the output boundary  */
    get last () {
        return this.processors[this.processors.length - 1]
    }

    /*  find a processor by its id  */
    find (id: string) {
        return this.processors.find((processor) => processor.id === id)
    }

    /*  adapt the boundary ends to the owning task  */
    attach (source: FrameReceiver, sink: FrameReceiver) {
        if (this.first.upstream !== null || this.last.downstream !== null)
            throw new Error("pipeline is already attached")
        this.first.upstream  = source
        this.last.downstream = sink
    }

    /*  release the boundary ends  */
    detach () {
        this.first.upstream  = null
        this.last.downstream = null
    }
}
