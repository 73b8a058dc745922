import { describe, expect, it } from 'vitest';
import { parseDuration, requireDuration } from '../duration';

describe('parseDuration', () => {
    it('reads numbers and numeric strings as seconds', () => {
        expect(parseDuration(3600)).toBe(3_600_000);
        expect(parseDuration('3600')).toBe(3_600_000);
        expect(parseDuration(0)).toBe(0);
    });

    it('reads shorthand units', () => {
        expect(parseDuration('250ms')).toBe(250);
        expect(parseDuration('30s')).toBe(30_000);
        expect(parseDuration('15m')).toBe(900_000);
        expect(parseDuration('1h')).toBe(3_600_000);
        expect(parseDuration('7d')).toBe(604_800_000);
        expect(parseDuration('2H')).toBe(7_200_000);
    });

    it('reads ISO-8601 durations', () => {
        expect(parseDuration('PT1H30M')).toBe(5_400_000);
        expect(parseDuration('P1DT12H')).toBe(129_600_000);
        expect(parseDuration('P2D')).toBe(172_800_000);
        expect(parseDuration('PT0S')).toBe(0);
    });

    it('reads clock notation with optional days', () => {
        expect(parseDuration('01:00:00')).toBe(3_600_000);
        expect(parseDuration('1.12:00:00')).toBe(129_600_000);
        expect(parseDuration('00:00:45')).toBe(45_000);
    });

    it('rejects negative and unparseable input', () => {
        expect(parseDuration(-1)).toBeNull();
        expect(parseDuration(Number.NaN)).toBeNull();
        expect(parseDuration('-5')).toBeNull();
        expect(parseDuration('soon')).toBeNull();
        expect(parseDuration('P')).toBeNull();
        expect(parseDuration('PT')).toBeNull();
        expect(parseDuration('00:61:00')).toBeNull();
        expect(parseDuration('')).toBeNull();
    });
});

describe('requireDuration', () => {
    it('returns milliseconds for a valid setting', () => {
        expect(requireDuration('SECRET_DEFAULT_TTL', '24h')).toBe(86_400_000);
    });

    it('names the setting it cannot parse', () => {
        expect(() => requireDuration('SECRET_MAX_TTL', 'forever')).toThrow('SECRET_MAX_TTL is not a valid duration: forever');
    });
});
