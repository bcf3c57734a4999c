import type { WindowQueryEngine } from './window-query.js';

export interface StatsResult {
  uptime_seconds: number;
  uptime_formatted: string;
  total_events: number;
  current_time: string;
  server_status: 'healthy';
  n_recent_events: number;
  timeframe_hours: number;
}

/**
 * Formats a duration as `1d 2h 3m 4s`, dropping leading zero units.
 * Fractions of a second are truncated.
 */
export function formatUptime(uptimeSeconds: number): string {
  const total = Math.max(Math.floor(uptimeSeconds), 0);
  const days = Math.floor(total / 86_400);
  const hours = Math.floor((total % 86_400) / 3_600);
  const minutes = Math.floor((total % 3_600) / 60);
  const seconds = total % 60;

  if (days > 0) return `${days}d ${hours}h ${minutes}m ${seconds}s`;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

/** Seconds elapsed between `startedAt` and `now`. */
export function uptimeSeconds(startedAt: Date, now: Date): number {
  return (now.getTime() - startedAt.getTime()) / 1000;
}

/**
 * Use case: assemble the server statistics payload.
 *
 * Running total and window count come from a single ledger read.
 */
export async function getStats(
  windowQuery: WindowQueryEngine,
  params: { timeframe_hours: number; startedAt: Date; now?: Date },
): Promise<StatsResult> {
  const now = params.now ?? new Date();
  const { running_total, count_within_window } = await windowQuery.query(
    params.timeframe_hours,
    now,
  );
  const uptime = uptimeSeconds(params.startedAt, now);

  return {
    uptime_seconds: uptime,
    uptime_formatted: formatUptime(uptime),
    total_events: running_total,
    current_time: now.toISOString(),
    server_status: 'healthy',
    n_recent_events: count_within_window,
    timeframe_hours: params.timeframe_hours,
  };
}
