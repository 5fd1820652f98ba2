const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000
};

const SUFFIXED = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i;
const ISO_8601 = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/i;

/**
 * Parses a duration into milliseconds.
 *
 * Accepts a number of seconds, a numeric string with a unit suffix (`90s`, `24h`, `7d`)
 * or an ISO-8601 duration limited to days and time parts (`P1D`, `PT12H30M`).
 * Returns `undefined` for anything else, including zero and negative lengths.
 */
export function parseDurationMs(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return positive(value * 1000);
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }

  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return positive(Number(trimmed) * 1000);
  }

  const suffixed = SUFFIXED.exec(trimmed);
  if (suffixed) {
    return positive(Number(suffixed[1]) * UNIT_MS[suffixed[2].toLowerCase()]);
  }

  const iso = ISO_8601.exec(trimmed);
  if (iso && trimmed.toUpperCase() !== 'P' && !trimmed.toUpperCase().endsWith('T')) {
    const [, days, hours, minutes, seconds] = iso;
    const total =
      Number(days ?? 0) * UNIT_MS.d +
      Number(hours ?? 0) * UNIT_MS.h +
      Number(minutes ?? 0) * UNIT_MS.m +
      Number(seconds ?? 0) * UNIT_MS.s;
    return positive(total);
  }

  return undefined;
}

function positive(ms: number): number | undefined {
  if (!Number.isFinite(ms)) {
    return undefined;
  }
  const rounded = Math.round(ms);
  return rounded > 0 ? rounded : undefined;
}
