/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  standard dependencies  */
import fs                     from "node:fs"
import path                   from "node:path"

/*  external dependencies  */
import { describe, it, expect, vi, afterEach } from "vitest"
import jsYAML                 from "js-yaml"

/*  internal dependencies  */
import { selectSessionConfig, taskParams } from "../src/convoflow-main-config"
import { ProcessorRegistry }  from "../src/convoflow-main-processors"
import Pipeline               from "../src/convoflow-pipeline"
import Processor              from "../src/convoflow-processor"

const file = path.resolve(__dirname, "..", "etc", "convoflow.yaml")

afterEach(() => {
    vi.unstubAllEnvs()
})

describe("session configuration", () => {
    it("selects a session of the shipped configuration file", () => {
        const obj: unknown = jsYAML.load(fs.readFileSync(file, "utf8"))
        const config = selectSessionConfig(obj, "turns", file)
        expect(config.pipeline.map((stage) => stage.processor)).toEqual([ "a2a-turn", "x2x-trace" ])
        expect(taskParams(config)).toEqual({
            sampleRate:            undefined,
            outputSampleRate:      undefined,
            allowInterruptions:    false,
            enableMetrics:         undefined,
            reportOnlyInitialTtfb: undefined,
            idleTimeoutSecs:       undefined,
            session:               undefined
        })
    })

    it("maps a zero idle timeout to no timeout", () => {
        const config = selectSessionConfig({
            demo: { idleTimeoutSecs: 0, pipeline: [ { processor: "x2x-trace" } ] }
        }, "demo", "demo.yaml")
        expect(taskParams(config).idleTimeoutSecs).toBeNull()
    })

    it("rejects invalid configurations", () => {
        expect(() => selectSessionConfig("text", "demo", "demo.yaml"))
            .toThrow("configuration file \"demo.yaml\" does not contain an object")
        expect(() => selectSessionConfig({ demo: { pipeline: [] } }, "other", "demo.yaml"))
            .toThrow("no such id \"other\" found in configuration file \"demo.yaml\"")
        expect(() => selectSessionConfig({ demo: { pipeline: [] } }, "demo", "demo.yaml"))
            .toThrow("session \"demo\": pipeline requires at least one processor")
        expect(() => selectSessionConfig({ demo: { sampleRate: 16000 } }, "demo", "demo.yaml"))
            .toThrow(/^session "demo": validation: /)
    })
})

describe("processor registry", () => {
    it("creates the processors of a pipeline with unique ids", () => {
        const registry = new ProcessorRegistry()
        const processors = registry.create([
            { processor: "x2x-trace" },
            { processor: "x2x-trace" },
            { processor: "xio-wav", id: "out", params: { file: "out.wav" } }
        ])
        expect(processors.map((processor) => processor.id)).toEqual([ "x2x-trace", "x2x-trace:2", "out" ])
        expect(new Pipeline(processors).last.id).toBe("out")
    })

    it("creates the full assistant session", () => {
        vi.stubEnv("CONVOFLOW_OPENAI_KEY", "test-key")
        const obj: unknown = jsYAML.load(fs.readFileSync(file, "utf8"))
        const config = selectSessionConfig(obj, "assistant", file)
        const processors = new ProcessorRegistry().create(config.pipeline)
        expect(processors.map((processor) => processor.id)).toEqual([
            "a2a-turn", "a2t-openai", "t2t-context", "t2t-openai", "x2x-trace", "t2a-openai", "xio-wav"
        ])
    })

    it("rejects unknown processors and invalid parameters", () => {
        const registry = new ProcessorRegistry()
        expect(() => registry.create([ { processor: "nope" } ])).toThrow("unknown processor <nope>")
        expect(() => registry.create([ { processor: "x2x-trace", params: { level: "loud" } } ]))
            .toThrow(/^processor <x2x-trace>: validation: /)
    })

    it("registers additional processors", () => {
        const messages = new Array<string>()
        const registry = new ProcessorRegistry((level, msg) => { messages.push(`${level}: ${msg}`) })
        const custom = { processorName: "x2x-custom", create: (id: string) => new Processor(id) }
        registry.register(custom)
        expect(registry.create([ { processor: "x2x-custom", id: "mine" } ])[0].id).toBe("mine")
        expect(messages).toContain("info: creating processor <mine> of type <x2x-custom>")
        expect(() => { registry.register(custom) }).toThrow("processor <x2x-custom> already registered")
    })
})
