/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { DateTime }           from "luxon"

/*  direction of a single frame hop  */
export type FrameDirection = "downstream" | "upstream"

/*  chat message of a conversation context  */
export type ChatRole = "system" | "user" | "assistant"
export type ChatMessage = {
    role:    ChatRole
    content: string
}

/*  session parameters announced by the start frame  */
export type StartParams = {
    sampleRate:            number
    outputSampleRate:      number
    allowInterruptions:    boolean
    enableMetrics:         boolean
    reportOnlyInitialTtfb: boolean
    session:               Readonly<Record<string, string | number | boolean>>
}

/*  single metrics measurement  */
export type MetricsData = {
    processor: string
    type:      "ttfb" | "processing"
    value:     number
}

type Empty = Record<never, never>

/*  payloads of all frame kinds  */
export interface FramePayloads {
    "start":                 StartParams
    "end":                   Empty
    "cancel":                { reason: string }
    "error":                 { message: string, fatal: boolean, processor: string }
    "interruption-start":    Empty
    "interruption-end":      Empty
    "audio-raw":             { audio: Buffer, sampleRate: number, channels: number, isSpeech?: boolean }
    "user-started-speaking": Empty
    "user-stopped-speaking": Empty
    "response-trigger":      Empty
    "transcript":            { text: string, speakerId: string, spokenAt: DateTime, language: string }
    "llm-messages-append":   { messages: readonly ChatMessage[] }
    "llm-context":           { messages: readonly ChatMessage[] }
    "llm-response-start":    Empty
    "text":                  { text: string }
    "llm-response-end":      Empty
    "assistant-reply":       { text: string, interrupted: boolean }
    "speak":                 { text: string }
    "synthesis-started":     Empty
    "synthesis-audio":       { audio: Buffer, sampleRate: number, channels: number }
    "synthesis-stopped":     Empty
    "metrics":               { data: MetricsData }
}
export type FrameKind = keyof FramePayloads

/*  a frame of a particular kind  */
export type FrameOf<K extends FrameKind> = Readonly<{
    kind:      K
    id:        number
    timestamp: DateTime
} & FramePayloads[K]>

/*  a frame of any kind  */
export type Frame = { [ K in FrameKind ]: FrameOf<K> }[FrameKind]

let frameCounter = 0

/*  create a new (immutable) frame  */
export function createFrame<K extends FrameKind> (kind: K, payload: FramePayloads[K]): FrameOf<K> {
    return Object.freeze<{ kind: K, id: number, timestamp: DateTime } & FramePayloads[K]>({ kind, id: ++frameCounter, timestamp: DateTime.now(), ...payload })
}

/*  frames bypassing the input queue of a processor  */
const immediateKinds = new Set<FrameKind>([
    "cancel", "error", "interruption-start", "interruption-end"
])
export function isImmediate (frame: Frame) {
    return immediateKinds.has(frame.kind)
}

/*  frames belonging to a response which an interruption discards  */
const interruptibleKinds = new Set<FrameKind>([
    "response-trigger", "llm-context",
    "llm-response-start", "text", "llm-response-end",
    "speak", "synthesis-started", "synthesis-audio", "synthesis-stopped"
])
export function isInterruptible (frame: Frame) {
    return interruptibleKinds.has(frame.kind)
}

/*  short human-readable frame description for logging  */
export function describeFrame (frame: Frame) {
    switch (frame.kind) {
        case "audio-raw":
        case "synthesis-audio":
            return `${frame.kind}#${frame.id} (${frame.audio.length} bytes @ ${frame.sampleRate} Hz)`
        case "text":
        case "speak":
        case "transcript":
        case "assistant-reply":
            return `${frame.kind}#${frame.id} (${JSON.stringify(frame.text)})`
        case "error":
            return `${frame.kind}#${frame.id} (${frame.fatal ? "fatal" : "recoverable"}: ${frame.message})`
        case "cancel":
            return `${frame.kind}#${frame.id} (${frame.reason})`
        case "llm-messages-append":
        case "llm-context":
            return `${frame.kind}#${frame.id} (${frame.messages.length} messages)`
        case "metrics":
            return `${frame.kind}#${frame.id} (${frame.data.processor} ${frame.data.type}=${frame.data.value.toFixed(3)}s)`
        default:
            return `${frame.kind}#${frame.id}`
    }
}
