import { describe, it, expect } from 'vitest';
import {
    CodeRecordSchema,
    RangeRecordSchema,
    CategoryRecordMapSchema,
    ConfigurationSchema,
    ValidatorOptionsSchema,
    RangeViewSchema,
} from '../src/schemas.js';

describe('CodeRecordSchema', () => {
    it('accepts a string or integer code', () => {
        expect(CodeRecordSchema.safeParse({ mcc: '5411' }).success).toBe(true);
        expect(CodeRecordSchema.safeParse({ mcc: 742 }).success).toBe(true);
    });

    it('stringifies numeric text and drops nulls', () => {
        const record = CodeRecordSchema.parse({ mcc: '5411', visa_clearing_name: 5411, iso_description: null });
        expect(record.visa_clearing_name).toBe('5411');
        expect(record.iso_description).toBeUndefined();
    });

    it('rejects a missing code', () => {
        expect(CodeRecordSchema.safeParse({ iso_description: 'Grocery' }).success).toBe(false);
    });

    it('rejects a non-boolean irs_reportable', () => {
        expect(CodeRecordSchema.safeParse({ mcc: '5411', irs_reportable: 'yes' }).success).toBe(false);
    });
});

describe('RangeRecordSchema', () => {
    it('accepts either boundary spelling', () => {
        expect(RangeRecordSchema.safeParse({ start: '5000', end: 5599, name: 'Retail' }).success).toBe(true);
        expect(RangeRecordSchema.safeParse({ start_code: '5000', end_code: '5599' }).success).toBe(true);
    });

    it('requires both boundaries', () => {
        const result = RangeRecordSchema.safeParse({ start: '5000', name: 'Retail' });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0]?.message).toBe('Range requires a start and an end code');
        }
    });
});

describe('CategoryRecordMapSchema', () => {
    it('parses a mapping of id to body', () => {
        const map = CategoryRecordMapSchema.parse({
            gambling: { name: 'Gambling', codes: ['7995', 7800, '3000-3350'] },
            empty: { name: 'Empty', codes: null },
        });
        expect(map.gambling?.codes).toEqual(['7995', 7800, '3000-3350']);
        expect(map.empty?.codes).toBeNull();
    });

    it('rejects a list', () => {
        expect(CategoryRecordMapSchema.safeParse([{ name: 'Gambling' }]).success).toBe(false);
    });
});

describe('ConfigurationSchema', () => {
    it('applies defaults', () => {
        expect(ConfigurationSchema.parse({})).toEqual({
            defaultDescriptionSource: 'iso',
            includeReservedRanges: false,
            cacheEnabled: true,
            dataPath: 'data',
        });
    });

    it('rejects unknown description sources', () => {
        expect(ConfigurationSchema.safeParse({ defaultDescriptionSource: 'discover' }).success).toBe(false);
    });

    it('rejects non-boolean flags', () => {
        expect(ConfigurationSchema.safeParse({ cacheEnabled: 'yes' }).success).toBe(false);
    });
});

describe('ValidatorOptionsSchema', () => {
    it('defaults to strict with no category rules', () => {
        const options = ValidatorOptionsSchema.parse({});
        expect(options.strict).toBe(true);
        expect(options.denyCategories).toEqual([]);
        expect(options.allowCategories).toBeUndefined();
    });

    it('keeps an empty allow-list distinct from none', () => {
        expect(ValidatorOptionsSchema.parse({ allowCategories: [] }).allowCategories).toEqual([]);
    });
});

describe('RangeViewSchema', () => {
    it('requires canonical codes', () => {
        const view = { start_code: '700', end_code: '0999', name: 'Agricultural', description: '', reserved: false };
        expect(RangeViewSchema.safeParse(view).success).toBe(false);
        expect(RangeViewSchema.safeParse({ ...view, start_code: '0700' }).success).toBe(true);
    });
});
