import type { LoopMode } from '@cadence/shared';

// ---------------------------------------------------------------------------
// formatDuration
//
// Converts a duration in milliseconds to an M:SS display string. Zero or
// negative durations (live streams) render as "live".
// Used in session log lines and the API's session summaries.
//
// Examples:
//   formatDuration(0)         → "live"
//   formatDuration(90_000)    → "1:30"
//   formatDuration(3_661_000) → "61:01"
// ---------------------------------------------------------------------------
export function formatDuration(ms: number): string {
  if (ms <= 0) return 'live';
  const totalSeconds = Math.floor(ms / 1000);
  const m = Math.floor(totalSeconds / 60);
  const s = totalSeconds % 60;
  return `${m}:${s.toString().padStart(2, '0')}`;
}

// ---------------------------------------------------------------------------
// formatLoopMode
//
// Returns the short display label for a loop mode.
// ---------------------------------------------------------------------------
export function formatLoopMode(mode: LoopMode): string {
  const labels: Record<LoopMode, string> = {
    off:   '⬛ Off',
    track: '🔂 Track',
    queue: '🔁 Queue',
  };
  return labels[mode];
}
