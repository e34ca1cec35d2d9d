/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  split off all complete sentences from a text  */
export function splitSentences (text: string) {
    const sentences = new Array<string>()
    let rest = text
    let m: RegExpMatchArray | null
    while ((m = rest.match(/^((?:.|\r?\n)+?[.;?!])\s+((?:.|\r?\n)*)$/)) !== null) {
        const sentence = m[1].trim()
        if (sentence !== "")
            sentences.push(sentence)
        rest = m[2]
    }
    return { sentences, rest }
}

/*  normalize whitespace of a text fragment  */
export function normalizeText (text: string) {
    return text.replace(/\s+/g, " ").trim()
}
