const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const unitMs: Record<string, number> = { ms: 1, s: SECOND, m: MINUTE, h: HOUR, d: DAY };

const SHORTHAND = /^(\d+)\s*(ms|s|m|h|d)$/i;
const ISO_DURATION = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/i;
const CLOCK = /^(?:(\d+)\.)?(\d{1,2}):(\d{2}):(\d{2})$/;

const toInt = (value: string | undefined) => (value ? Number(value) : 0);

/**
 * Parses a caller-supplied time to live into milliseconds.
 *
 * Supports formats:
 * - Number of seconds: `3600` or `"3600"`
 * - Shorthand: `"30s"`, `"15m"`, `"1h"`, `"7d"`
 * - ISO-8601 duration: `"PT1H30M"`, `"P1DT12H"`
 * - Clock notation: `"01:00:00"`, `"1.12:00:00"` (days.hours:minutes:seconds)
 *
 * Returns `null` for anything else, including negative numbers.
 */
export function parseDuration(input: string | number): number | null {
    if (typeof input === 'number') {
        return Number.isFinite(input) && input >= 0 ? Math.round(input * SECOND) : null;
    }

    const value = input.trim();
    if (/^\d+(?:\.\d+)?$/.test(value)) {
        return Math.round(Number(value) * SECOND);
    }

    const shorthand = value.match(SHORTHAND);
    if (shorthand) {
        return Number(shorthand[1]) * unitMs[shorthand[2].toLowerCase()];
    }

    const iso = value.match(ISO_DURATION);
    if (iso && value.toUpperCase() !== 'P' && !value.toUpperCase().endsWith('T')) {
        return toInt(iso[1]) * DAY + toInt(iso[2]) * HOUR + toInt(iso[3]) * MINUTE + toInt(iso[4]) * SECOND;
    }

    const clock = value.match(CLOCK);
    if (clock) {
        const minutes = Number(clock[3]);
        const seconds = Number(clock[4]);
        if (minutes > 59 || seconds > 59) return null;
        return toInt(clock[1]) * DAY + Number(clock[2]) * HOUR + minutes * MINUTE + seconds * SECOND;
    }

    return null;
}

/**
 * Like `parseDuration`, but for durations the process cannot run without.
 * @throws {Error} naming the offending setting
 */
export function requireDuration(name: string, input: string): number {
    const ms = parseDuration(input);
    if (ms === null) {
        throw new Error(`${name} is not a valid duration: ${input}`);
    }
    return ms;
}
