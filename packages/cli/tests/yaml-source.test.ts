import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Collection, DataLoadError } from '@mcc-registry/core';
import { YamlDataSource } from '../src/data/yaml-source.js';
import { bundledDataPath } from '../src/workspace/paths.js';

describe('YamlDataSource', () => {
    it('locates each data file inside the data path', () => {
        const source = new YamlDataSource('/data');
        expect(source.locate('codes')).toBe(join('/data', 'mcc_codes.yml'));
        expect(source.locate('ranges')).toBe(join('/data', 'ranges.yml'));
        expect(source.locate('categories')).toBe(join('/data', 'risk_categories.yml'));
    });

    describe('with files on disk', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'mcc-data-'));
            writeFileSync(join(dir, 'ranges.yml'), '- { start: "0700", end: "0999", name: Agricultural Services }\n');
            writeFileSync(join(dir, 'risk_categories.yml'), 'farm:\n  name: Farm\n  codes: [742, "0780"]\n');
            writeFileSync(
                join(dir, 'mcc_codes.yml'),
                '- mcc: 0742\n  iso_description: Veterinary Services\n- mcc: "0780"\n  iso_description: Landscaping\n'
            );
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('loads a collection from YAML', () => {
            const collection = new Collection(new YamlDataSource(dir));
            expect(collection.all().map((c) => c.mcc)).toEqual(['0742', '0780']);
            expect(collection.inRange('Agricultural Services')).toHaveLength(2);
            expect(collection.inCategory('farm').map((c) => c.mcc)).toEqual(['0742', '0780']);
        });

        it('reports the failing file', () => {
            writeFileSync(join(dir, 'mcc_codes.yml'), '- mcc: ABCD\n');
            const collection = new Collection(new YamlDataSource(dir));
            expect(() => collection.all()).toThrow(
                `Failed to load MCC data from: ${join(dir, 'mcc_codes.yml')}`
            );
        });

        it('rejects an empty file', () => {
            writeFileSync(join(dir, 'ranges.yml'), '');
            expect(() => new Collection(new YamlDataSource(dir)).ranges()).toThrow(DataLoadError);
        });
    });

    it('wraps a missing directory in DataLoadError', () => {
        const missing = join(tmpdir(), 'mcc-missing-data-dir');
        const collection = new Collection(new YamlDataSource(missing));
        try {
            collection.all();
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(DataLoadError);
            expect(err instanceof DataLoadError && err.source).toBe(join(missing, 'ranges.yml'));
        }
    });
});

describe('bundled dataset', () => {
    const collection = new Collection(new YamlDataSource(bundledDataPath()));

    it('loads every file', () => {
        expect(collection.count()).toBe(76);
        expect(collection.ranges()).toHaveLength(15);
        expect(collection.categories().map((c) => c.id)).toEqual([
            'gambling',
            'adult',
            'cash_advance',
            'crypto',
            'travel',
            'high_risk_merchants',
        ]);
    });

    it('keeps leading zeros', () => {
        expect(collection.find(742)?.description()).toBe('Veterinary Services');
    });

    it('places every code in exactly one range', () => {
        for (const code of collection.all()) {
            expect(collection.ranges().filter((r) => r.includes(code))).toHaveLength(1);
        }
    });

    it('resolves the grocery code', () => {
        const grocery = collection.findOrThrow('5411');
        expect(grocery.description()).toBe('Grocery Stores, Supermarkets');
        expect(grocery.description('usda')).toBe('Grocery Stores');
        expect(grocery.range()?.name).toBe('Retail Outlet Services');
        expect(grocery.stripe_code).toBe('grocery_stores_supermarkets');
    });

    it('expands range entries in categories', () => {
        expect(collection.inCategory('travel').map((c) => c.mcc)).toEqual([
            '3000',
            '3001',
            '3351',
            '3501',
            '4511',
            '4722',
            '7011',
            '7512',
        ]);
    });

    it('lists gambling codes', () => {
        expect(collection.inCategory('gambling').map((c) => c.mcc)).toEqual(['7800', '7801', '7802', '7995', '9406']);
    });
});
