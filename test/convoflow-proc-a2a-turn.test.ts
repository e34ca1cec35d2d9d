/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { describe, it, expect, vi } from "vitest"

/*  internal dependencies  */
import Pipeline               from "../src/convoflow-pipeline"
import Task                   from "../src/convoflow-task"
import ProcessorA2ATurn       from "../src/convoflow-proc-a2a-turn"
import { createFrame }        from "../src/convoflow-frame"
import type { SessionEvents } from "../src/convoflow-events"
import { Collector, pcm }     from "./convoflow-helpers"

const audio = (value: number, isSpeech?: boolean) =>
    createFrame("audio-raw", { audio: pcm(1600, value), sampleRate: 16000, channels: 1, isSpeech })

describe("turn detection processor", () => {
    it("ends the turn on the endpoint classification", async () => {
        const predict = vi.fn(() => ({ prediction: 1 as const, probability: 0.9 }))
        const turn = new ProcessorA2ATurn("turn", { analyzeAfterSecs: 0.2, classifier: { predict } })
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ turn, collector ]), { idleTimeoutSecs: null })
        const events = new Array<string>()
        task.events.subscribe("speech-started", () => { events.push("speech-started") })
        task.events.subscribe("speech-ended",   () => { events.push("speech-ended") })
        task.queueFrames([
            audio(1000, true), audio(1000, true), audio(1000, true),
            audio(0, false), audio(0, false), audio(0, false),
            createFrame("end", {})
        ])
        await task.run()
        expect(collector.kinds("downstream", [ "audio-raw" ])).toEqual([
            "start", "user-started-speaking", "user-stopped-speaking", "response-trigger", "end"
        ])
        expect(collector.kinds().filter((kind) => kind === "audio-raw").length).toBe(6)
        expect(predict).toHaveBeenCalledTimes(1)
        expect(events).toEqual([ "speech-started", "speech-ended" ])
    })

    it("consults the classifier only once per pause", async () => {
        const predict = vi.fn(() => ({ prediction: 0 as const, probability: 0.2 }))
        const turn = new ProcessorA2ATurn("turn", { analyzeAfterSecs: 0.1, classifier: { predict } })
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ turn, collector ]), { idleTimeoutSecs: null })
        task.queueFrames([
            audio(1000, true),
            audio(0, false), audio(0, false), audio(0, false),
            audio(1000, true),
            audio(0, false), audio(0, false),
            createFrame("end", {})
        ])
        await task.run()
        expect(predict).toHaveBeenCalledTimes(2)
        expect(collector.kinds("downstream", [ "audio-raw" ])).toEqual([
            "start", "user-started-speaking", "end"
        ])
    })

    it("ends the turn on the silence timeout with level based voice activity", async () => {
        const predict = vi.fn(() => ({ prediction: 0 as const, probability: 0.2 }))
        const turn = new ProcessorA2ATurn("turn", {
            stopSecs: 0.3, analyzeAfterSecs: 1, classifier: { predict }
        })
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ turn, collector ]), { idleTimeoutSecs: null })
        task.queueFrames([
            audio(1000), audio(1000),
            audio(0), audio(0), audio(0),
            createFrame("end", {})
        ])
        await task.run()
        expect(collector.kinds("downstream", [ "audio-raw" ])).toEqual([
            "start", "user-started-speaking", "user-stopped-speaking", "response-trigger", "end"
        ])
        expect(predict).not.toHaveBeenCalled()
        expect(turn.analyzer.phase).toBe("idle")
    })

    it("reports multi-channel audio as a recoverable error", async () => {
        const turn = new ProcessorA2ATurn("turn")
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ turn, collector ]), { idleTimeoutSecs: null })
        const errors = new Array<SessionEvents["error"]>()
        task.events.subscribe("error", (ev) => { errors.push(ev) })
        task.queueFrames([
            createFrame("audio-raw", { audio: pcm(3200), sampleRate: 16000, channels: 2 }),
            createFrame("end", {})
        ])
        await task.run()
        expect(errors).toEqual([ {
            message:   "turn detection requires mono audio (got 2 channels)",
            fatal:     false,
            processor: "turn"
        } ])
        expect(collector.kinds()).toEqual([ "start", "audio-raw", "end" ])
    })

    it("validates its configuration parameters", () => {
        expect(ProcessorA2ATurn.create("turn", { stopSecs: 1.5 }).analyzer.params.stopSecs).toBe(1.5)
        expect(() => ProcessorA2ATurn.create("turn", { stopSecs: -1 })).toThrow(/^processor <turn>: validation: /)
    })
})
