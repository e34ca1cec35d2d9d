/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { describe, it, expect, vi } from "vitest"

/*  internal dependencies  */
import Processor              from "../src/convoflow-processor"
import Pipeline               from "../src/convoflow-pipeline"
import Task                   from "../src/convoflow-task"
import { type Frame, type FrameDirection, createFrame } from "../src/convoflow-frame"
import type { SessionEvents } from "../src/convoflow-events"
import * as util              from "../src/convoflow-util"
import { Collector }          from "./convoflow-helpers"

/*  processor delaying text frames by a varying amount of time  */
class Jitter extends Processor {
    async handle (frame: Frame, direction: FrameDirection) {
        if (frame.kind === "text")
            await util.sleep(frame.text.length % 3 === 0 ? 5 : 0)
        await this.push(frame, direction)
    }
}

/*  processor failing on a particular text  */
class Failing extends Processor {
    constructor (id: string, private fatal: boolean) {
        super(id)
    }
    async handle (frame: Frame, direction: FrameDirection) {
        if (frame.kind === "text" && frame.text === "bad")
            throw new util.ProcessorError("cannot handle bad text", this.fatal)
        await this.push(frame, direction)
    }
}

/*  processor measuring time to first byte of text frames  */
class Timed extends Processor {
    async handle (frame: Frame, direction: FrameDirection) {
        if (frame.kind === "text") {
            this.startTtfbMetrics()
            await this.stopTtfbMetrics()
        }
        await this.push(frame, direction)
    }
}

const texts = (...items: string[]) => items.map((text) => createFrame("text", { text }))

describe("processor", () => {
    it("forwards frames in FIFO order despite varying handling time", async () => {
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ new Jitter("jitter"), collector ]), { idleTimeoutSecs: null })
        const items = [ "a", "bbb", "cc", "dddddd", "e", "fff", "g" ]
        task.queueFrames([ ...texts(...items), createFrame("end", {}) ])
        await task.run()
        expect(collector.texts()).toEqual(items)
        expect(collector.kinds()).toEqual([ "start", ...items.map(() => "text"), "end" ])
        expect(collector.state).toBe("ended")
    })

    it("converts a recoverable fault into an error frame pushed upstream", async () => {
        const before = new Collector("before")
        const after  = new Collector("after")
        const task = new Task(new Pipeline([ before, new Failing("failing", false), after ]), { idleTimeoutSecs: null })
        const errors = new Array<SessionEvents["error"]>()
        task.events.subscribe("error", (ev) => { errors.push(ev) })
        task.queueFrames([ ...texts("a", "bad", "c"), createFrame("end", {}) ])
        await task.run()
        expect(after.texts()).toEqual([ "a", "c" ])
        expect(before.kinds("upstream")).toEqual([ "error" ])
        expect(errors).toEqual([ { message: "cannot handle bad text", fatal: false, processor: "failing" } ])
    })

    it("terminates the chain on a fatal fault", async () => {
        const before  = new Collector("before")
        const failing = new Failing("failing", true)
        const after   = new Collector("after")
        const task = new Task(new Pipeline([ before, failing, after ]), { idleTimeoutSecs: null })
        const errors = new Array<SessionEvents["error"]>()
        task.events.subscribe("error", (ev) => { errors.push(ev) })
        task.queueFrames(texts("a", "bad", "c"))
        await task.run()
        expect(after.kinds()).toEqual([ "start", "text", "end" ])
        expect(after.texts()).toEqual([ "a" ])
        expect(errors).toEqual([ { message: "cannot handle bad text", fatal: true, processor: "failing" } ])
        expect(failing.state).toBe("ended")
        expect(after.state).toBe("ended")
        expect(before.state).toBe("cancelled")
    })

    it("holds queued frames while paused", async () => {
        const gate = new Processor("gate")
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ gate, collector ]), { idleTimeoutSecs: null })
        const running = task.run()
        task.queueFrames(texts("a"))
        await vi.waitFor(() => { expect(collector.texts()).toEqual([ "a" ]) })
        gate.pause()
        expect(gate.state).toBe("paused")
        task.queueFrames(texts("b"))
        await util.sleep(20)
        expect(collector.texts()).toEqual([ "a" ])
        expect(gate.pending).toBe(1)
        gate.resume()
        await vi.waitFor(() => { expect(collector.texts()).toEqual([ "a", "b" ]) })
        task.queueFrame(createFrame("end", {}))
        await running
    })

    it("reports only the initial time to first byte when requested", async () => {
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ new Timed("timed"), collector ]), {
            idleTimeoutSecs:       null,
            enableMetrics:         true,
            reportOnlyInitialTtfb: true
        })
        const metrics = new Array<SessionEvents["metrics"]>()
        task.events.subscribe("metrics", (ev) => { metrics.push(ev) })
        task.queueFrames([ ...texts("a", "b", "c"), createFrame("end", {}) ])
        await task.run()
        expect(collector.kinds()).toEqual([ "start", "metrics", "text", "text", "text", "end" ])
        expect(metrics.length).toBe(1)
        expect(metrics[0].processor).toBe("timed")
        expect(metrics[0].type).toBe("ttfb")
        expect(metrics[0].value).toBeGreaterThanOrEqual(0)
    })

    it("emits no metrics unless enabled", async () => {
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ new Timed("timed"), collector ]), { idleTimeoutSecs: null })
        task.queueFrames([ ...texts("a", "b"), createFrame("end", {}) ])
        await task.run()
        expect(collector.kinds()).toEqual([ "start", "text", "text", "end" ])
    })

    it("relays its log messages through the task", async () => {
        const task = new Task(new Pipeline([ new Failing("failing", false) ]), { idleTimeoutSecs: null }, "logged")
        const messages = new Array<string>()
        task.on("log", (level: string, msg: string) => { messages.push(`${level}: ${msg}`) })
        task.queueFrames([ ...texts("bad"), createFrame("end", {}) ])
        await task.run()
        expect(messages).toContain("error: processor <failing>: recoverable error: cannot handle bad text")
        expect(messages).toContain("info: task <logged>: pipeline finished")
    })
})
