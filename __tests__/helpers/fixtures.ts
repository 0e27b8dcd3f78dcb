import { mkdtempSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { PipelineConfig } from '@/lib/config';
import type { DocumentCollection, StoreDocument } from '@/load/types';

export function makeTempDir(): string {
    return mkdtempSync(path.join(os.tmpdir(), 'energy-etl-'));
}

/** Small config rooted in dir; same ranges and sub-sectors as the real one. */
export function testConfig(dir: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
    return {
        portalOrigin: 'https://africa-energy-portal.org',
        endpointPath: '/get-database-data',
        sourceLabel: 'Africa Energy Portal',
        mainGroup: 'Electricity',
        indicatorGroups: ['Access', 'Supply', 'Technical'],
        indicators: ['Electricity generation, Total (GWh)', 'Electricity import (GWh)'],
        countries: ['Kenya', 'Ghana'],
        requestYears: { start: 2000, end: 2022 },
        recordYears: { start: 2000, end: 2024 },
        validationYears: { start: 2000, end: 2022 },
        expectedSubSectors: ['Access', 'Supply', 'Technical'],
        files: {
            raw: path.join(dir, 'africa_energy_data.json'),
            formatted: path.join(dir, 'formatted_africa_energy_data.json'),
            report: path.join(dir, 'validation_report.json'),
        },
        batchSize: 500,
        probeTimeoutMs: 5000,
        table: 'energy_data',
        ...overrides,
    };
}

/** In-process stand-in for the document store. */
export class MemoryCollection implements DocumentCollection {
    documents: StoreDocument[] = [];
    batchSizes: number[] = [];
    pings = 0;

    constructor(
        private readonly opts: { pingError?: Error; hangPing?: boolean; failOnBatch?: number } = {}
    ) {}

    ping(): Promise<void> {
        this.pings++;
        if (this.opts.hangPing) return new Promise<void>(() => {});
        if (this.opts.pingError) return Promise.reject(this.opts.pingError);
        return Promise.resolve();
    }

    async insertMany(documents: readonly StoreDocument[]): Promise<number> {
        if (this.opts.failOnBatch === this.batchSizes.length + 1) {
            throw new Error('boom');
        }
        this.batchSizes.push(documents.length);
        this.documents.push(...documents);
        return documents.length;
    }
}

export const kenyaObservation = {
    name: 'Kenya',
    id: 'KE',
    indicator_name: 'X',
    unit: '%',
    indicator_group: 'Access',
    indicator_topic: 'Access',
    year: 2020,
    score: 42.5,
    url: '/x',
};
