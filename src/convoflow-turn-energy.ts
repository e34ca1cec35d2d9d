/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  internal dependencies  */
import type {
    EndpointClassifier, EndpointPrediction
}                             from "./convoflow-turn"
import * as util              from "./convoflow-util"

/*  endpoint classifier based on the energy of the segment tail  */
export class EnergyEndpointClassifier implements EndpointClassifier {
    private tailSecs:    number
    private thresholdDb: number
    private slopeDb:     number

    constructor (options: { tailSecs?: number, thresholdDb?: number, slopeDb?: number } = {}) {
        this.tailSecs    = options.tailSecs    ?? 0.3
        this.thresholdDb = options.thresholdDb ?? -45
        this.slopeDb     = options.slopeDb     ?? 3
        if (this.tailSecs <= 0)
            throw new Error("tail duration has to be positive")
    }

    predict (samples: Float32Array, sampleRate: number): EndpointPrediction {
        const tailLength = Math.max(1, Math.round(this.tailSecs * sampleRate))
        const tail       = samples.subarray(Math.max(0, samples.length - tailLength))
        const level      = util.lin2dB(util.rms(tail))

        /*  logistic mapping of the distance below the threshold  */
        const probability = 1 / (1 + Math.exp((level - this.thresholdDb) / this.slopeDb))
        return { prediction: probability >= 0.5 ? 1 : 0, probability }
    }
}
