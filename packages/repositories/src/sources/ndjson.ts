// NDJSON record log source
// Streams a log file line by line; a bad line becomes a DecodeError result and reading continues.

import { createReadStream } from 'node:fs';
import { ZodError } from 'zod';
import { DecodeError, decodeRecordLine, readNdjsonLines, type NdjsonLine } from '@flatlog/protocol';
import type { ReadRecordsOptions, RecordResult, RecordSource } from '../interfaces/index.js';

export class NdjsonRecordSource implements RecordSource {
  constructor(readonly path: string) {}

  async *records(options: ReadRecordsOptions = {}): AsyncGenerator<RecordResult> {
    const channels = options.channels ? new Set(options.channels) : null;

    for await (const line of readNdjsonLines(createReadStream(this.path))) {
      const result = decodeLine(line);
      const channel = result.ok ? result.record.channel : result.error.channel;
      // Undecodable lines with no known channel are always reported
      if (channels && channel !== undefined && !channels.has(channel)) {
        continue;
      }
      yield result;
    }
  }
}

function decodeLine({ text, offset, line }: NdjsonLine): RecordResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      error: new DecodeError(`Invalid JSON at line ${line}`, { offset, line, cause: error }),
    };
  }

  try {
    return { ok: true, record: decodeRecordLine(data) };
  } catch (error) {
    const detail =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
        : error instanceof Error
          ? error.message
          : String(error);
    return {
      ok: false,
      error: new DecodeError(`Invalid record at line ${line}: ${detail}`, {
        channel: channelHint(data),
        offset,
        line,
        cause: error,
      }),
    };
  }
}

function channelHint(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'channel' in data && typeof data.channel === 'string') {
    return data.channel || undefined;
  }
  return undefined;
}
