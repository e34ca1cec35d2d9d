/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { type }               from "arktype"

/*  internal dependencies  */
import type { TaskParams }    from "./convoflow-task"
import * as util              from "./convoflow-util"

/*  configuration of a single pipeline stage  */
export const stageConfig = type({
    processor:   "string",
    "id?":       "string",
    "params?":   "object"
})
export type StageConfig = typeof stageConfig.infer

/*  configuration of a conversation session  */
export const sessionConfig = type({
    "sampleRate?":            "number > 0",
    "outputSampleRate?":      "number > 0",
    "allowInterruptions?":    "boolean",
    "enableMetrics?":         "boolean",
    "reportOnlyInitialTtfb?": "boolean",
    "idleTimeoutSecs?":       "number >= 0",
    "session?":               { "[string]": "string | number | boolean" },
    pipeline:                 stageConfig.array()
})
export type SessionConfig = typeof sessionConfig.infer

/*  file with multiple session configurations  */
const configFile = type({ "[string]": "object" })

/*  select and validate one session configuration of a parsed YAML file  */
export function selectSessionConfig (obj: unknown, id: string, file: string): SessionConfig {
    if (typeof obj !== "object" || obj === null)
        throw new Error(`configuration file "${file}" does not contain an object`)
    const sessions = util.importObject(`configuration file "${file}"`, obj, configFile)
    const session = sessions[id]
    if (session === undefined)
        throw new Error(`no such id "${id}" found in configuration file "${file}"`)
    const config = util.importObject(`session "${id}"`, session, sessionConfig)
    if (config.pipeline.length === 0)
        throw new Error(`session "${id}": pipeline requires at least one processor`)
    return config
}

/*  derive the task parameters of a session configuration  */
export function taskParams (config: SessionConfig): Partial<TaskParams> {
    return {
        sampleRate:            config.sampleRate,
        outputSampleRate:      config.outputSampleRate,
        allowInterruptions:    config.allowInterruptions,
        enableMetrics:         config.enableMetrics,
        reportOnlyInitialTtfb: config.reportOnlyInitialTtfb,
        idleTimeoutSecs:       config.idleTimeoutSecs === 0 ? null : config.idleTimeoutSecs,
        session:               config.session
    }
}
