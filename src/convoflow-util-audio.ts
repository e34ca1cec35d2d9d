/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  calculate duration of an audio buffer  */
export function audioBufferDuration (
    buffer: Buffer,
    sampleRate   = 16000,
    bitDepth     = 16,
    channels     = 1,
    littleEndian = true
) {
    /*  sanity check parameters  */
    if (!Buffer.isBuffer(buffer))
        throw new Error("invalid input (Buffer expected)")
    if (littleEndian !== true)
        throw new Error("only Little Endian supported")
    if (sampleRate <= 0)
        throw new Error("sample rate must be positive")
    if (bitDepth <= 0 || bitDepth % 8 !== 0)
        throw new Error("bit depth must be positive and multiple of 8")
    if (channels <= 0)
        throw new Error("channels must be positive")

    /*  calculate duration  */
    const bytesPerSample = bitDepth / 8
    const totalSamples = buffer.length / (bytesPerSample * channels)
    return totalSamples / sampleRate
}

/*  helper function: convert Buffer in PCM/I16 to Float32Array in PCM/F32 format  */
export function convertBufToF32 (buf: Buffer, littleEndian = true) {
    if (buf.length % 2 !== 0)
        throw new Error("buffer length must be even for 16-bit samples")
    const dataView = new DataView(buf.buffer, buf.byteOffset, buf.byteLength)
    const arr = new Float32Array(buf.length / 2)
    for (let i = 0; i < arr.length; i++)
        arr[i] = dataView.getInt16(i * 2, littleEndian) / 32768
    return arr
}

/*  root-mean-square amplitude of samples  */
export function rms (samples: Float32Array) {
    if (samples.length === 0)
        return 0
    let sum = 0
    for (let i = 0; i < samples.length; i++)
        sum += samples[i] * samples[i]
    return Math.sqrt(sum / samples.length)
}

/*  level of a PCM/I16 buffer in dBFS  */
export function audioLevel (buf: Buffer) {
    return lin2dB(rms(convertBufToF32(buf)))
}

export function lin2dB (x: number): number {
    return 20 * Math.log10(Math.max(x, 1e-12))
}

/*  write WAV header  */
export function writeWavHeader (
    length: number,
    options?: { audioFormat?: number, channels?: number, sampleRate?: number, bitDepth?: number }
) {
    const audioFormat  = options?.audioFormat ?? 0x001 /* PCM */
    const channels     = options?.channels    ?? 1     /* mono */
    const sampleRate   = options?.sampleRate  ?? 24000 /* 24KHz */
    const bitDepth     = options?.bitDepth    ?? 16    /* 16-Bit */

    const headerLength = 44
    const fileSize     = length + headerLength
    const header       = Buffer.alloc(headerLength)

    const byteRate     = (sampleRate * channels * bitDepth) / 8
    const blockAlign   = (channels * bitDepth) / 8

    let offset = 0
    header.write("RIFF", offset);               offset += 4
    header.writeUInt32LE(fileSize - 8, offset); offset += 4
    header.write("WAVE", offset);               offset += 4
    header.write("fmt ", offset);               offset += 4
    header.writeUInt32LE(16, offset);           offset += 4
    header.writeUInt16LE(audioFormat, offset);  offset += 2
    header.writeUInt16LE(channels, offset);     offset += 2
    header.writeUInt32LE(sampleRate, offset);   offset += 4
    header.writeUInt32LE(byteRate, offset);     offset += 4
    header.writeUInt16LE(blockAlign, offset);   offset += 2
    header.writeUInt16LE(bitDepth, offset);     offset += 2
    header.write("data", offset);               offset += 4
    header.writeUInt32LE(length, offset);       offset += 4

    return header
}

/*  read WAV header  */
export function readWavHeader (buffer: Buffer) {
    if (buffer.length < 44)
        throw new Error("WAV header too short, expected at least 44 bytes")

    let offset = 0
    const riffHead     = buffer.subarray(offset, offset + 4).toString(); offset += 4
    const fileSize     = buffer.readUInt32LE(offset);                    offset += 4
    const waveHead     = buffer.subarray(offset, offset + 4).toString(); offset += 4
    const fmtHead      = buffer.subarray(offset, offset + 4).toString(); offset += 4
    const formatLength = buffer.readUInt32LE(offset);                    offset += 4
    const audioFormat  = buffer.readUInt16LE(offset);                    offset += 2
    const channels     = buffer.readUInt16LE(offset);                    offset += 2
    const sampleRate   = buffer.readUInt32LE(offset);                    offset += 4
    const byteRate     = buffer.readUInt32LE(offset);                    offset += 4
    const blockAlign   = buffer.readUInt16LE(offset);                    offset += 2
    const bitDepth     = buffer.readUInt16LE(offset);                    offset += 2
    const data         = buffer.subarray(offset, offset + 4).toString(); offset += 4
    const dataLength   = buffer.readUInt32LE(offset);                    offset += 4

    if (riffHead !== "RIFF")
        throw new Error(`Invalid WAV file: expected RIFF header, got "${riffHead}"`)
    if (waveHead !== "WAVE")
        throw new Error(`Invalid WAV file: expected WAVE header, got "${waveHead}"`)
    if (fmtHead !== "fmt ")
        throw new Error(`Invalid WAV file: expected "fmt " header, got "${fmtHead}"`)
    if (data !== "data")
        throw new Error(`Invalid WAV file: expected "data" header, got "${data}"`)

    return {
        riffHead, fileSize, waveHead, fmtHead, formatLength, audioFormat,
        channels, sampleRate, byteRate, blockAlign, bitDepth, data, dataLength
    }
}
