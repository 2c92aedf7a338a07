import { FramingError, createEnvelope } from '../../domain/index.js';
import type { Envelope } from '../../domain/index.js';

const EVENT_PREFIX = 'event: ';
const DATA_PREFIX = 'data: ';
const BLOCK_SEPARATOR = '\n\n';

/**
 * Text event-stream framing.
 *
 *   event: <category>\n   (only when the envelope has a category)
 *   data: <payload>\n
 *   \n
 */
export function formatEnvelope(envelope: Envelope): string {
  const event = envelope.category !== undefined ? `${EVENT_PREFIX}${envelope.category}\n` : '';
  return `${event}${DATA_PREFIX}${envelope.payload}\n\n`;
}

/**
 * Parses ONE block (without its terminating blank line).
 *
 * Accepts exactly `data: <payload>` or `event: <category>\ndata: <payload>`.
 * Comments, `id:`/`retry:` fields, repeated fields and anything else throw
 * FramingError.
 */
export function parseBlock(block: string): Envelope {
  const lines = block.split('\n');

  if (lines.length === 1) {
    return createEnvelope(readField(lines[0] ?? '', DATA_PREFIX));
  }

  if (lines.length === 2) {
    const category = readField(lines[0] ?? '', EVENT_PREFIX);
    if (category === '') {
      throw new FramingError('Empty event category');
    }
    return createEnvelope(readField(lines[1] ?? '', DATA_PREFIX), category);
  }

  throw new FramingError(`Expected 1 or 2 lines per block, got ${lines.length}`);
}

function readField(line: string, prefix: string): string {
  if (!line.startsWith(prefix)) {
    throw new FramingError(`Expected "${prefix.trim()}" line, got ${JSON.stringify(line)}`);
  }
  const value = line.slice(prefix.length);
  if (value.includes('\r')) {
    throw new FramingError('Carriage return inside a field');
  }
  return value;
}

/**
 * Incremental decoder for a chunked event stream.
 *
 * Buffers text until a blank line completes a block and hands back every
 * complete block per chunk; a partial block waits for the next chunk.
 */
export class SseDecoder {
  private buffer = '';

  push(chunk: string): Envelope[] {
    this.buffer += chunk;
    const envelopes: Envelope[] = [];

    let boundary = this.buffer.indexOf(BLOCK_SEPARATOR);
    while (boundary !== -1) {
      const block = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + BLOCK_SEPARATOR.length);
      envelopes.push(parseBlock(block));
      boundary = this.buffer.indexOf(BLOCK_SEPARATOR);
    }

    return envelopes;
  }

  /** Bytes received that do not yet form a complete block. */
  get pendingLength(): number {
    return this.buffer.length;
  }
}
