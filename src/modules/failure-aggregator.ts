import type { StackEvent } from '../types/index.js';
import type { StackOperationClient } from './stack-client.js';
import { isFailedStatus } from './stack-status.js';

/**
 * Formats a failure event as "STATUS: REASON"
 */
export function formatFailure(event: Pick<StackEvent, 'resourceStatus' | 'resourceStatusReason'>): string {
  return `${event.resourceStatus}: ${event.resourceStatusReason}`;
}

/**
 * Lists resource failures recorded on a stack after a point in time
 *
 * Reads the stack's full event history and keeps the events that are strictly
 * newer than `since` and whose status ends in `_FAILED`. The client returns
 * events oldest first and that order is kept.
 *
 * @param stackId - Stack name or id
 * @param since - Watermark; events at or before it are ignored
 * @returns "STATUS: REASON" strings, empty when nothing failed
 * @throws Whatever the client throws while reading the history
 *
 * @example
 * ```typescript
 * const failures = await listFailures(client, 'demo', new Date(start - 2000));
 * // ['CREATE_FAILED: Resource limit exceeded']
 * ```
 */
export async function listFailures(
  client: StackOperationClient,
  stackId: string,
  since: Date
): Promise<string[]> {
  const events = await client.describeStackEvents(stackId);
  const watermark = since.getTime();

  return events
    .filter((event) => event.timestamp.getTime() > watermark && isFailedStatus(event.resourceStatus))
    .map(formatFailure);
}
