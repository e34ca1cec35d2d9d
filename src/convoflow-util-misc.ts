/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import { type, type Type }    from "arktype"

/*  internal dependencies  */
import { run }                from "./convoflow-util-error"

/*  sleep: wait a duration of time and then resolve  */
export function sleep (durationMs: number) {
    return new Promise<void>((resolve) => {
        setTimeout(() => {
            resolve()
        }, durationMs)
    })
}

/*  await a promise, but reject once a duration of time has passed  */
export async function awaitWithTimeout<T> (promise: Promise<T>, durationMs: number, info = "timeout") {
    let timer: ReturnType<typeof setTimeout> | undefined
    const expiry = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            reject(new Error(info))
        }, durationMs)
    })
    try {
        return await Promise.race([ promise, expiry ])
    }
    finally {
        clearTimeout(timer)
    }
}

/*  import an object with parsing and strict error handling  */
export function importObject<T>(name: string, arg: object | string, validator: Type<T, {}>): T {
    const obj: object = typeof arg === "string" ?
        run(`${name}: parsing JSON`, () => JSON.parse(arg)) :
        arg
    const result = validator(obj)
    if (result instanceof type.errors)
        throw new Error(`${name}: validation: ${result.summary}`)
    return result as T
}
