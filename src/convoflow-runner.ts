/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  standard dependencies  */
import Events                 from "node:events"

/*  internal dependencies  */
import type Task              from "./convoflow-task"
import type { LogLevel }      from "./convoflow-processor"
import * as util              from "./convoflow-util"

/*  runner options  */
export type RunnerOptions = {
    handleSignals?: boolean
    signals?:       NodeJS.Signals[]
}

/*  operational driver for one or more tasks  */
export default class Runner extends Events.EventEmitter {
    private tasks = new Set<Task>()
    private options: Required<RunnerOptions>

    constructor (options: RunnerOptions = {}) {
        super()
        this.options = {
            handleSignals: false,
            signals:       [ "SIGINT", "SIGTERM" ],
            ...options
        }
    }

    /*  emit a log message  */
    log (level: LogLevel, msg: string) {
        this.emit("log", level, msg)
    }

    /*  currently owned tasks  */
    get active () {
        return this.tasks.size
    }

    /*  drive tasks concurrently to completion  */
    async run (...tasks: Task[]) {
        /*  hook into tasks  */
        const relay = (level: LogLevel, msg: string) => { this.log(level, msg) }
        for (const task of tasks) {
            this.tasks.add(task)
            task.on("log", relay)
        }

        /*  hook into process signals  */
        const shutdownHandler = (signal: NodeJS.Signals) => {
            this.log("warning", `**** received signal ${signal} -- cancelling ${this.tasks.size} task(s) ****`)
            this.cancel(`signal ${signal}`).catch((error: unknown) => {
                this.log("error", util.ensureError(error, "cancellation failed").message)
            })
        }
        if (this.options.handleSignals)
            for (const signal of this.options.signals)
                process.on(signal, shutdownHandler)

        /*  await termination of all tasks  */
        try {
            const results = await Promise.allSettled(tasks.map((task) => task.run()))
            const failure = results.find((result): result is PromiseRejectedResult =>
                result.status === "rejected")
            if (failure !== undefined)
                throw util.ensureError(failure.reason, "task failed")
        }
        finally {
            if (this.options.handleSignals)
                for (const signal of this.options.signals)
                    process.removeListener(signal, shutdownHandler)
            for (const task of tasks) {
                task.removeListener("log", relay)
                this.tasks.delete(task)
            }
        }
    }

    /*  cancel all owned tasks and await their termination  */
    async cancel (reason = "runner cancelled") {
        await Promise.all(Array.from(this.tasks).map((task) => task.cancel(reason)))
    }
}
