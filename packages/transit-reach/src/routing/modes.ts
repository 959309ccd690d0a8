/**
 * Travel mode labels used in origin files, mapped to OTP mode lists.
 */

const MODE_LABELS: Readonly<Record<string, string>> = {
  'public transport': 'TRANSIT,WALK',
  driving: 'CAR',
  train: 'RAIL,WALK',
  bus: 'BUS,WALK',
  walking: 'WALK',
  cycling: 'BICYCLE',
};

/**
 * Resolve a per-point mode label ("Public Transport", "Cycling", ...) to OTP
 * modes. Unknown or missing labels fall back to `fallback`.
 */
export function resolveModes(label: string | undefined, fallback: string): string {
  if (label === undefined) {
    return fallback;
  }
  return MODE_LABELS[label.trim().toLowerCase()] ?? fallback;
}

/**
 * Normalize a mode list: strip spaces, upper-case (`"walk, transit"` → `WALK,TRANSIT`)
 */
export function normalizeModes(modes: string): string {
  return modes
    .split(',')
    .map((mode) => mode.trim().toUpperCase())
    .filter((mode) => mode.length > 0)
    .join(',');
}

/**
 * Column name for the non-transit leg time in trip tables
 */
export function accessTimeColumn(modes: string): 'walk_time_mins' | 'drive_time_mins' | 'cycle_time_mins' {
  const normalized = normalizeModes(modes);
  if (normalized === 'CAR') return 'drive_time_mins';
  if (normalized === 'BICYCLE') return 'cycle_time_mins';
  return 'walk_time_mins';
}
