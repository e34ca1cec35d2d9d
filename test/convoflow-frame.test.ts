/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { describe, it, expect } from "vitest"
import { DateTime }           from "luxon"

/*  internal dependencies  */
import {
    createFrame, isImmediate, isInterruptible, describeFrame
}                             from "../src/convoflow-frame"

describe("frame model", () => {
    it("creates immutable frames with increasing ids", () => {
        const a = createFrame("text", { text: "hello" })
        const b = createFrame("end", {})
        expect(a.kind).toBe("text")
        expect(a.text).toBe("hello")
        expect(b.id).toBeGreaterThan(a.id)
        expect(DateTime.isDateTime(a.timestamp)).toBe(true)
        expect(Object.isFrozen(a)).toBe(true)
        expect(() => { Reflect.set(a, "text", "changed") }).not.toThrow()
        expect(a.text).toBe("hello")
    })

    it("classifies immediate frames", () => {
        expect(isImmediate(createFrame("cancel", { reason: "test" }))).toBe(true)
        expect(isImmediate(createFrame("interruption-start", {}))).toBe(true)
        expect(isImmediate(createFrame("error", { message: "x", fatal: false, processor: "p" }))).toBe(true)
        expect(isImmediate(createFrame("end", {}))).toBe(false)
        expect(isImmediate(createFrame("start", {
            sampleRate: 16000, outputSampleRate: 24000, allowInterruptions: true,
            enableMetrics: false, reportOnlyInitialTtfb: false, session: {}
        }))).toBe(false)
    })

    it("classifies response output as interruptible", () => {
        expect(isInterruptible(createFrame("speak", { text: "hi" }))).toBe(true)
        expect(isInterruptible(createFrame("synthesis-audio", {
            audio: Buffer.alloc(4), sampleRate: 24000, channels: 1
        }))).toBe(true)
        expect(isInterruptible(createFrame("audio-raw", {
            audio: Buffer.alloc(4), sampleRate: 16000, channels: 1
        }))).toBe(false)
        expect(isInterruptible(createFrame("user-started-speaking", {}))).toBe(false)
        expect(isInterruptible(createFrame("assistant-reply", { text: "", interrupted: true }))).toBe(false)
    })

    it("describes frames for logging", () => {
        const frame = createFrame("audio-raw", { audio: Buffer.alloc(320), sampleRate: 16000, channels: 1 })
        expect(describeFrame(frame)).toBe(`audio-raw#${frame.id} (320 bytes @ 16000 Hz)`)
        const text = createFrame("text", { text: "hi" })
        expect(describeFrame(text)).toBe(`text#${text.id} ("hi")`)
    })
})
