/**
 * POLLING MODULE
 * ==============
 */

export { StatusPoller } from './status-poller';

export type { StatusPollerEvents, StatusPollerConfig, PollResult } from './status-poller';
