/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  internal dependencies  */
import type Processor          from "./convoflow-processor"
import type { LogLevel }       from "./convoflow-processor"
import type { StageConfig }    from "./convoflow-main-config"
import ProcessorA2ATurn        from "./convoflow-proc-a2a-turn"
import ProcessorA2TOpenAI      from "./convoflow-proc-a2t-openai"
import ProcessorT2TContext     from "./convoflow-proc-t2t-context"
import ProcessorT2TOpenAI      from "./convoflow-proc-t2t-openai"
import ProcessorT2AOpenAI      from "./convoflow-proc-t2a-openai"
import ProcessorX2XTrace       from "./convoflow-proc-x2x-trace"
import ProcessorXIOWav         from "./convoflow-proc-xio-wav"

/*  the contract of a configurable processor class  */
export interface ProcessorFactory {
    processorName: string
    create (id: string, params: object): Processor
}

/*  the built-in processors  */
const builtin: ProcessorFactory[] = [
    ProcessorA2ATurn,
    ProcessorA2TOpenAI,
    ProcessorT2TContext,
    ProcessorT2TOpenAI,
    ProcessorT2AOpenAI,
    ProcessorX2XTrace,
    ProcessorXIOWav
]

/*  the processor registry  */
export class ProcessorRegistry {
    public factories = new Map<string, ProcessorFactory>()

    /*  simple constructor  */
    constructor (
        private log: (level: LogLevel, msg: string) => void = () => {}
    ) {
        for (const factory of builtin)
            this.register(factory)
    }

    /*  register a processor class  */
    register (factory: ProcessorFactory) {
        if (this.factories.has(factory.processorName))
            throw new Error(`processor <${factory.processorName}> already registered`)
        this.log("debug", `registering processor <${factory.processorName}>`)
        this.factories.set(factory.processorName, factory)
    }

    /*  instantiate the processors of a pipeline configuration  */
    create (stages: StageConfig[]) {
        const counts = new Map<string, number>()
        return stages.map((stage) => {
            const factory = this.factories.get(stage.processor)
            if (factory === undefined)
                throw new Error(`unknown processor <${stage.processor}>`)
            const n = (counts.get(stage.processor) ?? 0) + 1
            counts.set(stage.processor, n)
            const id = stage.id ?? (n > 1 ? `${stage.processor}:${n}` : stage.processor)
            this.log("info", `creating processor <${id}> of type <${stage.processor}>`)
            return factory.create(id, stage.params ?? {})
        })
    }
}
