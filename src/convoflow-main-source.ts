/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  standard dependencies  */
import fs                     from "node:fs"
import path                   from "node:path"

/*  internal dependencies  */
import type Task              from "./convoflow-task"
import { createFrame }        from "./convoflow-frame"
import * as util              from "./convoflow-util"

/*  options of the WAV file source  */
export type WavSourceOptions = {
    chunkMs?:             number
    realtime?:            boolean
    trailingSilenceSecs?: number
}

/*  input boundary collaborator feeding a WAV file into a task  */
export class WavSource {
    private chunkMs:             number
    private realtime:            boolean
    private trailingSilenceSecs: number

    constructor (
        private task: Task,
        private file: string,
        options: WavSourceOptions = {}
    ) {
        this.chunkMs             = options.chunkMs             ?? 20
        this.realtime            = options.realtime            ?? true
        this.trailingSilenceSecs = options.trailingSilenceSecs ?? 4
        if (this.chunkMs <= 0)
            throw new Error("chunk duration has to be positive")
    }

    /*  read and validate the WAV file  */
    async load () {
        const buffer = await fs.promises.readFile(this.file)
        const header = util.readWavHeader(buffer)
        if (header.audioFormat !== 0x0001 /* PCM */)
            throw new Error(`WAV file "${this.file}" not based on PCM format`)
        if (header.bitDepth !== 16)
            throw new Error(`WAV file "${this.file}" not based on 16 bit samples`)
        if (header.channels !== 1)
            throw new Error(`WAV file "${this.file}" not mono`)
        const audio = buffer.subarray(44, 44 + header.dataLength)
        return { audio, sampleRate: header.sampleRate }
    }

    /*  feed the audio as paced chunks, followed by trailing silence and the end frame  */
    async play () {
        const { audio, sampleRate } = await this.load()
        const client = path.basename(this.file)
        const chunkBytes = Math.round(sampleRate * this.chunkMs / 1000) * 2
        const silence = Buffer.alloc(Math.round(sampleRate * this.trailingSilenceSecs) * 2)
        const stream = Buffer.concat([ audio, silence ])
        this.task.events.emit("client-connected", { client })
        for (let offset = 0; offset < stream.length; offset += chunkBytes) {
            if (this.task.hasFinished)
                break
            this.task.queueFrame(createFrame("audio-raw", {
                audio:      stream.subarray(offset, offset + chunkBytes),
                sampleRate,
                channels:   1
            }))
            if (this.realtime)
                await util.sleep(this.chunkMs)
        }
        this.task.events.emit("client-disconnected", { client })
        if (!this.task.hasFinished)
            this.task.queueFrame(createFrame("end", {}))
    }
}
