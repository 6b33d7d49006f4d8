/**
 * Server-Sent Events parsing and framing for upstream chat streams.
 * @packageDocumentation
 */

import type { StreamEvent } from './types.js';

export const DONE_MARKER = '[DONE]';

/**
 * Re-frame one payload as an SSE data event.
 */
export function formatSseData(data: string): string {
  return `data: ${data}\n\n`;
}

export const DONE_FRAME = formatSseData(DONE_MARKER);

function classify(data: string): StreamEvent {
  if (data === DONE_MARKER) return { type: 'done' };
  if (data.startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(data);
      if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
        return { type: 'error', data };
      }
    } catch {
      // Not JSON; forwarded untouched
    }
  }
  return { type: 'chunk', data };
}

function parseBlock(block: string): string | null {
  const lines: string[] = [];
  for (const line of block.split('\n')) {
    if (line.startsWith('data:')) {
      const rest = line.slice(5);
      lines.push(rest.startsWith(' ') ? rest.slice(1) : rest);
    }
  }
  return lines.length > 0 ? lines.join('\n') : null;
}

/**
 * Turn decoded text pieces into stream events. Events may span piece
 * boundaries. Parsing stops after the terminal marker.
 */
export async function* parseSseStream(source: AsyncIterable<string>): AsyncGenerator<StreamEvent, void, unknown> {
  let buffer = '';
  // A CR at the end of a piece may be the first half of a CRLF
  let heldCr = false;

  for await (const piece of source) {
    let text: string = heldCr ? `\r${piece}` : piece;
    heldCr = text.endsWith('\r');
    if (heldCr) text = text.slice(0, -1);
    buffer += text.replace(/\r\n?/g, '\n');

    let boundary = buffer.indexOf('\n\n');
    while (boundary !== -1) {
      const block = buffer.slice(0, boundary);
      buffer = buffer.slice(boundary + 2);

      const data = parseBlock(block);
      if (data !== null) {
        const event = classify(data);
        yield event;
        if (event.type === 'done') return;
      }
      boundary = buffer.indexOf('\n\n');
    }
  }

  if (heldCr) buffer += '\n';
  const tail = parseBlock(buffer);
  if (tail !== null) {
    yield classify(tail);
  }
}
