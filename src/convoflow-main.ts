/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  internal dependencies  */
import { CLIContext }         from "./convoflow-main-cli"
import { taskParams }         from "./convoflow-main-config"
import { ProcessorRegistry }  from "./convoflow-main-processors"
import { WavSource }          from "./convoflow-main-source"
import Pipeline               from "./convoflow-pipeline"
import Task                   from "./convoflow-task"
import Runner                 from "./convoflow-runner"
import type { LogLevel }      from "./convoflow-processor"
import * as util              from "./convoflow-util"

/*  class of main procedure  */
export default class Main {
    /*  static entry point  */
    static main () {
        /*  create CLI environment  */
        const cli = new CLIContext()

        /*  catch and handle uncaught exceptions  */
        process.on("uncaughtException", (err) => {
            const error = util.ensureError(err, "uncaught exception")
            cli.handleTopLevelError(error)
        })

        /*  catch and handle unhandled promise rejections  */
        process.on("unhandledRejection", (reason) => {
            const error = util.ensureError(reason, "unhandled promise rejection")
            cli.handleTopLevelError(error)
        })

        /*  instantiate ourself  */
        const main = new Main(cli)
        main.run().catch((err: unknown) => {
            /*  handle errors at the top-level  */
            const error = util.ensureError(err, "top-level error")
            cli.handleTopLevelError(error)
        })
    }

    /*  simple constructor  */
    constructor (
        private cli: CLIContext
    ) {}

    /*  effective main procedure  */
    async run () {
        /*  initialize CLI context  */
        await this.cli.init()
        if (!this.cli.isInitialized())
            throw new Error("CLI context initialization failed")
        const { cli, args, config } = this.cli
        const log = (level: LogLevel, msg: string) => { cli.log(level, msg) }

        /*  create processors and link them into a pipeline  */
        const registry  = new ProcessorRegistry(log)
        const pipeline  = new Pipeline(registry.create(config.pipeline))
        const task      = new Task(pipeline, taskParams(config))

        /*  report session events  */
        task.events.subscribe("client-connected",    (ev) => { log("info", `client connected: ${ev.client}`) })
        task.events.subscribe("client-disconnected", (ev) => { log("info", `client disconnected: ${ev.client}`) })
        task.events.subscribe("speech-started",      (ev) => { log("info", `user speech started at ${ev.timestamp.toISO()}`) })
        task.events.subscribe("speech-ended",        (ev) => { log("info", `user speech ended at ${ev.timestamp.toISO()}`) })
        task.events.subscribe("idle-timeout",        (ev) => { log("warning", `session idle for ${ev.idleSecs}s`) })
        task.events.subscribe("metrics",             (ev) => { log("info", `metrics: <${ev.processor}> ${ev.type}: ${ev.value.toFixed(3)}s`) })
        task.events.subscribe("error",               (ev) => {
            log(ev.fatal ? "error" : "warning", `processor <${ev.processor}> failed: ${ev.message}`)
        })

        /*  drive the task while feeding the input audio  */
        const runner = new Runner({ handleSignals: true })
        runner.on("log", log)
        const source = new WavSource(task, args.i, {
            realtime:            args.r,
            trailingSilenceSecs: args.S
        })
        const feeding = source.play().catch(async (err: unknown) => {
            log("error", util.ensureError(err, "audio input").message)
            await task.cancel("audio input failed")
        })
        await runner.run(task)
        await feeding

        /*  terminate process  */
        if (task.isCancelled)
            cli.log("warning", "session was cancelled")
        cli.log("info", "terminate process (exit code 0)")
        process.exit(0)
    }
}
