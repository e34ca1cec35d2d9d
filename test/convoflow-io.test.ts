/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  standard dependencies  */
import fs                     from "node:fs"
import os                     from "node:os"
import path                   from "node:path"

/*  external dependencies  */
import { describe, it, expect, beforeEach, afterEach } from "vitest"

/*  internal dependencies  */
import Pipeline               from "../src/convoflow-pipeline"
import Task                   from "../src/convoflow-task"
import ProcessorXIOWav        from "../src/convoflow-proc-xio-wav"
import ProcessorX2XTrace      from "../src/convoflow-proc-x2x-trace"
import { WavSource }          from "../src/convoflow-main-source"
import { createFrame }        from "../src/convoflow-frame"
import * as util              from "../src/convoflow-util"
import { Collector, pcm }     from "./convoflow-helpers"

let dir = ""
beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "convoflow-"))
})
afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true })
})

const synthesized = (samples: number, sampleRate = 24000) =>
    createFrame("synthesis-audio", { audio: pcm(samples, 7), sampleRate, channels: 1 })

describe("WAV file output", () => {
    it("writes the synthesized audio on session end", async () => {
        const file = path.join(dir, "out.wav")
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([
            new ProcessorXIOWav("wav", { file, passthrough: false }), collector
        ]), { idleTimeoutSecs: null })
        task.queueFrames([ synthesized(100), synthesized(100), createFrame("end", {}) ])
        await task.run()
        const buffer = await fs.promises.readFile(file)
        expect(buffer.length).toBe(444)
        const header = util.readWavHeader(buffer)
        expect(header.sampleRate).toBe(24000)
        expect(header.channels).toBe(1)
        expect(header.dataLength).toBe(400)
        expect(buffer.readInt16LE(44)).toBe(7)
        expect(collector.kinds()).toEqual([ "start", "end" ])
    })

    it("rejects a change of the audio format", async () => {
        const file = path.join(dir, "out.wav")
        const task = new Task(new Pipeline([
            ProcessorXIOWav.create("wav", { file })
        ]), { idleTimeoutSecs: null })
        const errors = new Array<string>()
        task.events.subscribe("error", (ev) => { errors.push(ev.message) })
        task.queueFrames([ synthesized(100), synthesized(100, 16000), createFrame("end", {}) ])
        await task.run()
        expect(errors).toEqual([ "audio format changed to 16000 Hz / 1 channels" ])
        expect(util.readWavHeader(await fs.promises.readFile(file)).dataLength).toBe(200)
    })

    it("requires an output file", () => {
        expect(() => ProcessorXIOWav.create("wav", {})).toThrow(/^processor <wav>: validation: /)
    })
})

describe("WAV file source", () => {
    const writeWav = async (file: string, audio: Buffer, channels = 1) => {
        const header = util.writeWavHeader(audio.length, { sampleRate: 16000, channels })
        await fs.promises.writeFile(file, Buffer.concat([ header, audio ]))
    }

    it("feeds the audio as chunks followed by silence and the end frame", async () => {
        const file = path.join(dir, "in.wav")
        await writeWav(file, pcm(1600, 500))
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ collector ]), { idleTimeoutSecs: null })
        const clients = new Array<string>()
        task.events.subscribe("client-connected",    (ev) => { clients.push(`+${ev.client}`) })
        task.events.subscribe("client-disconnected", (ev) => { clients.push(`-${ev.client}`) })
        const source = new WavSource(task, file, { chunkMs: 20, realtime: false, trailingSilenceSecs: 0.04 })
        const running = task.run()
        await source.play()
        await running
        const chunks = collector.frames().flatMap((frame) => frame.kind === "audio-raw" ? [ frame.audio ] : [])
        expect(chunks.map((chunk) => chunk.length)).toEqual([ 640, 640, 640, 640, 640, 640, 640 ])
        expect(chunks[0].readInt16LE(0)).toBe(500)
        expect(chunks[6].readInt16LE(0)).toBe(0)
        expect(collector.kinds().at(-1)).toBe("end")
        expect(clients).toEqual([ "+in.wav", "-in.wav" ])
    })

    it("accepts only mono PCM/I16 files", async () => {
        const file = path.join(dir, "stereo.wav")
        await writeWav(file, pcm(1600), 2)
        const task = new Task(new Pipeline([ new Collector("collector") ]), { idleTimeoutSecs: null })
        await expect(new WavSource(task, file).load()).rejects.toThrow(`WAV file "${file}" not mono`)
    })
})

describe("trace processor", () => {
    it("logs the selected frame kinds", async () => {
        const trace = new ProcessorX2XTrace("trace", { name: "in", kinds: [ "text" ] })
        const collector = new Collector("collector")
        const task = new Task(new Pipeline([ trace, collector ]), { idleTimeoutSecs: null })
        const messages = new Array<string>()
        task.on("log", (level: string, msg: string) => {
            if (msg.startsWith("processor <trace>"))
                messages.push(`${level}: ${msg}`)
        })
        const text = createFrame("text", { text: "hi" })
        task.queueFrames([ text, createFrame("end", {}) ])
        await task.run()
        expect(trace.count).toBe(1)
        expect(messages).toEqual([ `info: processor <trace>: [in]: --> text#${text.id} ("hi")` ])
        expect(collector.kinds()).toEqual([ "start", "text", "end" ])
    })

    it("skips audio frames unless requested", () => {
        expect(new ProcessorX2XTrace("trace").traces("audio-raw")).toBe(false)
        expect(new ProcessorX2XTrace("trace").traces("text")).toBe(true)
        expect(new ProcessorX2XTrace("trace", { audio: true }).traces("synthesis-audio")).toBe(true)
    })
})
