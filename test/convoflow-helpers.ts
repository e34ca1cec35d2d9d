/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  internal dependencies  */
import Processor              from "../src/convoflow-processor"
import type { Frame, FrameDirection, FrameKind } from "../src/convoflow-frame"

/*  processor recording every frame passing by  */
export class Collector extends Processor {
    public static processorName = "collector"
    public received = new Array<{ frame: Frame, direction: FrameDirection }>()

    /*  frames seen in one direction  */
    frames (direction: FrameDirection = "downstream") {
        return this.received
            .filter((entry) => entry.direction === direction)
            .map((entry) => entry.frame)
    }

    /*  kinds of frames seen in one direction  */
    kinds (direction: FrameDirection = "downstream", except: FrameKind[] = []) {
        return this.frames(direction)
            .map((frame) => frame.kind)
            .filter((kind) => !except.includes(kind))
    }

    /*  texts of the text frames seen downstream  */
    texts () {
        return this.frames().flatMap((frame) => frame.kind === "text" ? [ frame.text ] : [])
    }

    async handle (frame: Frame, direction: FrameDirection) {
        this.received.push({ frame, direction })
        await this.push(frame, direction)
    }
}

/*  PCM/I16 mono chunk filled with a constant sample value  */
export function pcm (samples: number, value = 0) {
    return Buffer.from(new Int16Array(samples).fill(value).buffer)
}
