import { readFileSync, rmSync, writeFileSync } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { toRawObservation, yearKey } from '@/ingest/types';
import type { RawObservation } from '@/ingest/types';
import { reshapeObservations, runTransform } from '@/normalize/wideRecords';
import { kenyaObservation, makeTempDir, testConfig } from './helpers/fixtures';

const options = {
    recordYears: { start: 2000, end: 2024 },
    portalOrigin: 'https://africa-energy-portal.org',
    sourceLabel: 'Africa Energy Portal',
};

function obs(overrides: Partial<RawObservation>): RawObservation {
    return { ...toRawObservation(kenyaObservation), ...overrides };
}

const yearSlots = (record: object) => Object.keys(record).filter((k) => /^\d+$/.test(k));

describe('reshapeObservations', () => {
    it('turns a single Kenya observation into one wide record', () => {
        const [record, ...rest] = reshapeObservations([toRawObservation(kenyaObservation)], options);
        expect(rest).toHaveLength(0);
        expect(record).toMatchObject({
            country: 'Kenya',
            country_serial: 'KE',
            metric: 'X',
            unit: '%',
            sector: 'Access',
            sub_sector: 'Access',
            source_link: 'https://africa-energy-portal.org/x',
            source: 'Africa Energy Portal',
        });
        expect(record['2020']).toBe(42.5);
        for (let y = 2000; y <= 2024; y++) {
            if (y !== 2020) expect(record[yearKey(y)]).toBeNull();
        }
    });

    it('creates every year slot of the range on every record', () => {
        const records = reshapeObservations(
            [obs({ year: 2003 }), obs({ name: 'Ghana', id: 'GH', year: 2024 })],
            options
        );
        expect(records).toHaveLength(2);
        for (const record of records) {
            expect(yearSlots(record)).toHaveLength(25);
            expect(record).toHaveProperty('2000');
            expect(record).toHaveProperty('2024');
        }
    });

    it('keeps one record per distinct (country, metric) regardless of input order', () => {
        const input = [
            obs({ year: 2001 }),
            obs({ indicator_name: 'Y', year: 2001 }),
            obs({ name: 'Ghana', year: 2001 }),
            obs({ year: 2002 }),
            obs({ indicator_name: 'Y', year: 2005 }),
        ];
        expect(reshapeObservations(input, options)).toHaveLength(3);
        expect(reshapeObservations([...input].reverse(), options)).toHaveLength(3);
    });

    it('orders records by first appearance of their key', () => {
        const records = reshapeObservations(
            [obs({ name: 'Ghana' }), obs({ name: 'Kenya' }), obs({ name: 'Ghana', year: 2010 })],
            options
        );
        expect(records.map((r) => r.country)).toEqual(['Ghana', 'Kenya']);
    });

    it('keeps the last value for a repeated (country, metric, year)', () => {
        const [record] = reshapeObservations([obs({ score: 1 }), obs({ score: 2 })], options);
        expect(record['2020']).toBe(2);
    });

    it('takes fixed fields from the first observation of a key', () => {
        const [record] = reshapeObservations([obs({ unit: '%' }), obs({ unit: 'GWh', year: 2021 })], options);
        expect(record.unit).toBe('%');
        expect(record['2021']).toBe(42.5);
    });

    it('ignores years outside the record range', () => {
        const [record] = reshapeObservations([obs({ year: 1999 }), obs({ year: 2025 })], options);
        expect(yearSlots(record)).toHaveLength(25);
        expect(record).not.toHaveProperty('1999');
        expect(record).not.toHaveProperty('2025');
        expect(record['2020']).toBeNull();
    });

    it('keeps a zero distinct from the no-value marker', () => {
        const [record] = reshapeObservations([obs({ score: 0 })], options);
        expect(record['2020']).toBe(0);
        expect(record['2019']).toBeNull();
    });

    it('keys records with absent country or metric and falls back to the bare portal link', () => {
        const records = reshapeObservations(
            [toRawObservation({ year: 2010, score: 5 }), toRawObservation({ year: 2011, score: 6 })],
            options
        );
        expect(records).toHaveLength(1);
        expect(records[0].country).toBeNull();
        expect(records[0].metric).toBeNull();
        expect(records[0].source_link).toBe('https://africa-energy-portal.org');
        expect(records[0]['2010']).toBe(5);
        expect(records[0]['2011']).toBe(6);
    });
});

describe('toRawObservation', () => {
    it('accepts a four-digit year string and drops wrong-typed fields', () => {
        expect(toRawObservation({ name: 'Chad', year: '2015', score: { v: 1 }, url: 7 })).toEqual({
            name: 'Chad',
            id: null,
            indicator_name: null,
            unit: null,
            indicator_group: null,
            indicator_topic: null,
            year: 2015,
            score: null,
            url: null,
        });
    });
});

describe('runTransform', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('writes byte-identical output on repeated runs', async () => {
        const config = testConfig(dir);
        const raw = [
            kenyaObservation,
            { ...kenyaObservation, year: 2021, score: null },
            { ...kenyaObservation, name: 'Ghana', id: 'GH', indicator_topic: 'Supply' },
        ];
        writeFileSync(config.files.raw, JSON.stringify(raw), 'utf-8');

        const first = await runTransform(config);
        const firstText = readFileSync(config.files.formatted, 'utf-8');
        await runTransform(config);
        const secondText = readFileSync(config.files.formatted, 'utf-8');

        expect(first.records).toBe(2);
        expect(secondText).toBe(firstText);
        const parsed = JSON.parse(firstText);
        expect(parsed).toHaveLength(2);
        expect(parsed[0]['2020']).toBe(42.5);
        expect(parsed[0]['2021']).toBeNull();
        expect(parsed[1].country).toBe('Ghana');
    });

    it('throws when the raw file is not a list', async () => {
        const config = testConfig(dir);
        writeFileSync(config.files.raw, JSON.stringify({ data: [] }), 'utf-8');
        await expect(runTransform(config)).rejects.toThrow('expected a JSON list of observations');
    });

    it('throws when the raw file is missing', async () => {
        await expect(runTransform(testConfig(dir))).rejects.toThrow();
    });
});
