// Record source summary for the info command

import { nanosToSeconds, type EpochNanos } from '@flatlog/protocol';
import type { RecordSource } from '@flatlog/repositories';
import { silentLogger, type Logger } from '../logging.js';

export type TopicSummary = {
  channel: string;
  /** Type ids seen on the channel, in first-seen order */
  typeIds: string[];
  count: number;
};

export type SourceSummary = {
  path: string;
  /** Channels in first-seen order */
  topics: TopicSummary[];
  messageCount: number;
  /** Records that could not be decoded */
  skipped: number;
  startTime: EpochNanos | null;
  endTime: EpochNanos | null;
  /** Seconds between the first and last receive time */
  durationSeconds: number;
};

/**
 * Read a source once and summarize its channels and time range.
 */
export async function summarizeSource(
  source: RecordSource,
  options: { logger?: Logger } = {}
): Promise<SourceSummary> {
  const logger = options.logger ?? silentLogger;
  const topics = new Map<string, TopicSummary>();
  let messageCount = 0;
  let skipped = 0;
  let startTime: EpochNanos | null = null;
  let endTime: EpochNanos | null = null;

  for await (const result of source.records()) {
    if (!result.ok) {
      skipped++;
      logger.warn('Skipping undecodable record', {
        source: source.path,
        channel: result.error.channel,
        offset: result.error.offset,
      });
      continue;
    }

    const { channel, typeId, receivedTime } = result.record;
    let topic = topics.get(channel);
    if (!topic) {
      topic = { channel, typeIds: [], count: 0 };
      topics.set(channel, topic);
    }
    topic.count++;
    if (!topic.typeIds.includes(typeId)) {
      topic.typeIds.push(typeId);
    }

    messageCount++;
    if (startTime === null || receivedTime < startTime) startTime = receivedTime;
    if (endTime === null || receivedTime > endTime) endTime = receivedTime;
  }

  return {
    path: source.path,
    topics: Array.from(topics.values()),
    messageCount,
    skipped,
    startTime,
    endTime,
    durationSeconds: startTime !== null && endTime !== null ? nanosToSeconds(endTime - startTime) : 0,
  };
}
