// Table materializer - the rectangular table for one channel

import type { FlatRow, MaterializedTable } from '@flatlog/protocol';
import type { Logger } from '../logging.js';
import { SchemaUnifier, type UnifyOptions } from '../unify/unifier.js';

export type MaterializeOptions = Omit<UnifyOptions, 'channel'> & {
  logger?: Logger;
};

/**
 * Unify a channel's flattened rows into a table.
 * Widenings are logged at debug and returned as conflicts.
 *
 * @throws ChannelBufferOverflowError when the channel has more rows than maxRows
 */
export function materializeTable(
  channel: string,
  rows: Iterable<FlatRow>,
  options: MaterializeOptions = {}
): MaterializedTable {
  const unifier = new SchemaUnifier({ channel, maxRows: options.maxRows });
  for (const row of rows) {
    unifier.add(row);
  }
  return finishTable(channel, unifier, options.logger);
}

/**
 * Finish an incremental unifier as a materialized table
 */
export function finishTable(channel: string, unifier: SchemaUnifier, logger?: Logger): MaterializedTable {
  const { schema, rows, conflicts } = unifier.finish();

  for (const conflict of conflicts) {
    logger?.debug('Widened column', {
      channel,
      column: conflict.column,
      observed: conflict.observed,
      resolved: conflict.resolved,
    });
  }

  return { channel, schema, rows, conflicts };
}
