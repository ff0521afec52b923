/**
 * Runtime event stream decoding
 *
 * The Docker events endpoint streams one JSON object per line. Chunks do
 * not respect line boundaries, so lines are reassembled before parsing.
 */

import { StringDecoder } from 'string_decoder';
import { z } from 'zod';
import { errorMessage, type Logger, type RawEvent } from '@dockwatch/core';

export const dockerEventSchema = z.object({
  Type: z.string(),
  Action: z.string(),
  Actor: z
    .object({
      ID: z.string().optional(),
      Attributes: z.record(z.string()).optional(),
    })
    .optional(),
  time: z.number().optional(),
});

export type DockerEventMessage = z.infer<typeof dockerEventSchema>;

export function toRawEvent(message: DockerEventMessage): RawEvent {
  return {
    type: message.Type,
    action: message.Action,
    actor: {
      id: message.Actor?.ID,
      attributes: message.Actor?.Attributes ?? {},
    },
    time: message.time,
  };
}

/**
 * Parse one line of the event stream. Blank, malformed and non-event
 * lines yield undefined.
 */
export function parseEventLine(line: string, logger: Logger): RawEvent | undefined {
  const trimmed = line.trim();
  if (trimmed === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    logger.warn('Skipping malformed runtime event', { error: errorMessage(error), line: trimmed.slice(0, 200) });
    return undefined;
  }

  const result = dockerEventSchema.safeParse(parsed);
  if (!result.success) {
    logger.debug('Skipping unrecognized runtime message', { line: trimmed.slice(0, 200) });
    return undefined;
  }
  return toRawEvent(result.data);
}

/**
 * Decode newline-delimited JSON events from a byte or text stream
 */
export async function* decodeEvents(
  source: AsyncIterable<Buffer | string>,
  logger: Logger
): AsyncGenerator<RawEvent> {
  const decoder = new StringDecoder('utf8');
  let buffered = '';

  for await (const chunk of source) {
    buffered += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    let newline = buffered.indexOf('\n');
    while (newline !== -1) {
      const event = parseEventLine(buffered.slice(0, newline), logger);
      buffered = buffered.slice(newline + 1);
      if (event) {
        yield event;
      }
      newline = buffered.indexOf('\n');
    }
  }

  buffered += decoder.end();
  const tail = parseEventLine(buffered, logger);
  if (tail) {
    yield tail;
  }
}
