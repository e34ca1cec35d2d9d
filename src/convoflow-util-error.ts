/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  error raised by a processor, optionally unrecoverable  */
export class ProcessorError extends Error {
    constructor (message: string, public readonly fatal = false, options?: { cause?: unknown }) {
        super(message, options)
        this.name = "ProcessorError"
    }
}

/*  helper function for retrieving an Error object  */
export function ensureError (error: unknown, prefix?: string, debug = false): Error {
    if (error instanceof Error && prefix === undefined && debug === false)
        return error
    let msg = error instanceof Error ?
        error.message : String(error)
    if (prefix)
        msg = `${prefix}: ${msg}`
    if (debug && error instanceof Error)
        msg = `${msg}\n${error.stack}`
    if (error instanceof Error) {
        const err = new Error(msg, { cause: error })
        err.stack = error.stack
        return err
    }
    else
        return new Error(msg)
}

/*  helper function for retrieving a Promise object  */
export function ensurePromise<T> (arg: T | Promise<T>): Promise<T> {
    if (!(arg instanceof Promise))
        arg = Promise.resolve(arg)
    return arg
}

/*  run a synchronous action, prefixing a raised error with a description  */
export function run<T> (description: string, action: () => T): T {
    try {
        return action()
    }
    catch (arg: unknown) {
        throw ensureError(arg, description)
    }
}
