/**
 * Decoding of container log buffers.
 *
 * Without a TTY the Engine multiplexes stdout and stderr into frames:
 * one byte stream type, three zero bytes, a big-endian uint32 payload
 * length, then the payload. With a TTY the buffer is the raw output.
 */

const FRAME_HEADER_LENGTH = 8;

// 0 stdin, 1 stdout, 2 stderr
const MAX_STREAM_TYPE = 2;

function looksMultiplexed(buffer: Buffer): boolean {
    if (buffer.length < FRAME_HEADER_LENGTH) return false;
    const streamType = buffer[0];
    return streamType <= MAX_STREAM_TYPE && buffer[1] === 0 && buffer[2] === 0 && buffer[3] === 0;
}

/**
 * Concatenate frame payloads in arrival order. A truncated final frame
 * contributes whatever bytes are present.
 */
export function demuxLogBuffer(buffer: Buffer): Buffer {
    const chunks: Buffer[] = [];
    let offset = 0;

    while (offset + FRAME_HEADER_LENGTH <= buffer.length) {
        const size = buffer.readUInt32BE(offset + 4);
        const start = offset + FRAME_HEADER_LENGTH;
        const end = Math.min(start + size, buffer.length);
        chunks.push(buffer.subarray(start, end));
        offset = start + size;
    }

    return Buffer.concat(chunks);
}

/**
 * Turn a log buffer into text, demultiplexing unless the container has a TTY
 */
export function decodeLogBuffer(buffer: Buffer, tty: boolean): string {
    if (tty || !looksMultiplexed(buffer)) {
        return buffer.toString('utf-8');
    }
    return demuxLogBuffer(buffer).toString('utf-8');
}
