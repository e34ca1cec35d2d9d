/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  public programming interface  */
export * from "./convoflow-frame"
export * from "./convoflow-events"
export * from "./convoflow-turn"
export * from "./convoflow-turn-energy"
export { default as Processor }         from "./convoflow-processor"
export type { FrameReceiver, LogLevel, ProcessorState } from "./convoflow-processor"
export { default as Pipeline }          from "./convoflow-pipeline"
export { default as Task, taskParamsDefault, type TaskParams } from "./convoflow-task"
export { default as Runner, type RunnerOptions } from "./convoflow-runner"
export { default as ProcessorA2ATurn }   from "./convoflow-proc-a2a-turn"
export { default as ProcessorA2T }       from "./convoflow-proc-a2t"
export { default as ProcessorA2TOpenAI } from "./convoflow-proc-a2t-openai"
export { default as ProcessorT2TContext } from "./convoflow-proc-t2t-context"
export { default as ProcessorT2T }       from "./convoflow-proc-t2t"
export { default as ProcessorT2TOpenAI } from "./convoflow-proc-t2t-openai"
export { default as ProcessorT2A }       from "./convoflow-proc-t2a"
export { default as ProcessorT2AOpenAI } from "./convoflow-proc-t2a-openai"
export { default as ProcessorX2XTrace }  from "./convoflow-proc-x2x-trace"
export { default as ProcessorXIOWav }    from "./convoflow-proc-xio-wav"
export { ProcessorError }                from "./convoflow-util-error"
