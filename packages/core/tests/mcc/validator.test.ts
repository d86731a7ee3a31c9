import { describe, it, expect } from 'vitest';
import { Validator, validate, valid } from '../../src/mcc/validator.js';
import { DataLoadError } from '../../src/mcc/errors.js';
import { makeCollection, makeRecords } from './fixtures.js';

const collection = makeCollection();

describe('Validator', () => {
    describe('format rule', () => {
        const validator = new Validator(collection);

        it('rejects non-digit values', () => {
            expect(validator.validate('XXXX')).toEqual(['must be a valid 4-digit MCC code']);
            expect(validator.validate('54a1')).toEqual(['must be a valid 4-digit MCC code']);
        });

        it('rejects values longer than 4 digits', () => {
            expect(validator.validate('54111')).toEqual(['must be a valid 4-digit MCC code']);
        });

        it('rejects blank strings', () => {
            expect(validator.validate('   ')).toEqual(['must be a valid 4-digit MCC code']);
        });

        it('rejects objects without a code instead of stringifying them', () => {
            const throwing = {
                toString(): string {
                    throw new Error('not printable');
                },
            };
            expect(validator.validate(Object.create(null))).toEqual(['must be a valid 4-digit MCC code']);
            expect(validator.validate(throwing)).toEqual(['must be a valid 4-digit MCC code']);
            expect(validator.validate(['5411'])).toEqual(['must be a valid 4-digit MCC code']);
            expect(validator.validate(true)).toEqual(['must be a valid 4-digit MCC code']);
        });

        it('accepts bigint values', () => {
            expect(validator.validate(5411n)).toEqual([]);
        });

        it('skips absent values', () => {
            expect(validator.validate(null)).toEqual([]);
            expect(validator.validate(undefined)).toEqual([]);
        });
    });

    describe('strict mode', () => {
        const validator = new Validator(collection);

        it('accepts known codes in every shape', () => {
            expect(validator.validate('5411')).toEqual([]);
            expect(validator.validate(742)).toEqual([]);
            expect(validator.validate(' 0742 ')).toEqual([]);
            expect(validator.valid('5411')).toBe(true);
        });

        it('accepts Code instances and mcc-bearing records', () => {
            const grocery = collection.findOrThrow('5411');
            expect(validator.validate(grocery)).toEqual([]);
            expect(validator.validate({ mcc: '742' })).toEqual([]);
            expect(validator.validate({ code: '5411' })).toEqual(['must be a valid 4-digit MCC code']);
        });

        it('rejects unknown codes', () => {
            expect(validator.validate('9999')).toEqual(['is not a recognized MCC code']);
            expect(validator.valid('9999')).toBe(false);
        });
    });

    describe('lenient mode', () => {
        const validator = new Validator(collection, { strict: false });

        it('only checks the format', () => {
            expect(validator.validate('9999')).toEqual([]);
            expect(validator.validate('XXXX')).toEqual(['must be a valid 4-digit MCC code']);
        });

        it('ignores category rules', () => {
            const lenient = new Validator(collection, { strict: false, denyCategories: ['gambling'] });
            expect(lenient.validate('7995')).toEqual([]);
        });
    });

    describe('category rules', () => {
        it('rejects codes in a denied category', () => {
            const validator = new Validator(collection, { denyCategories: ['gambling'] });
            expect(validator.validate('7995')).toEqual(['is in a denied category']);
            expect(validator.validate('5411')).toEqual([]);
        });

        it('normalizes denied ids', () => {
            const validator = new Validator(collection, { denyCategories: [' Gambling '] });
            expect(validator.validate('7995')).toEqual(['is in a denied category']);
        });

        it('ignores unknown denied ids', () => {
            const validator = new Validator(collection, { denyCategories: ['nonexistent'] });
            expect(validator.validate('7995')).toEqual([]);
        });

        it('accepts only codes in an allowed category', () => {
            const validator = new Validator(collection, { allowCategories: ['food', 'healthcare'] });
            expect(validator.validate('5411')).toEqual([]);
            expect(validator.validate('8011')).toEqual([]);
            expect(validator.validate('4511')).toEqual(['is in a denied category']);
        });

        it('rejects every code for an empty allow-list', () => {
            const validator = new Validator(collection, { allowCategories: [] });
            expect(validator.validate('5411')).toEqual(['is in a denied category']);
        });

        it('lets deny win over allow', () => {
            const validator = new Validator(collection, {
                denyCategories: ['food'],
                allowCategories: ['food'],
            });
            expect(validator.validate('5411')).toEqual(['is in a denied category']);
        });

        it('reports the first failing rule only', () => {
            const validator = new Validator(collection, { denyCategories: ['gambling'] });
            expect(validator.validate('9999')).toEqual(['is not a recognized MCC code']);
        });
    });

    it('applies schema defaults to options', () => {
        expect(new Validator(collection).options).toEqual({ strict: true, denyCategories: [] });
    });

    it('propagates failures to load the collection', () => {
        const broken = makeCollection({}, { ...makeRecords(), codes: [{ mcc: 'ABCD' }] });
        expect(() => new Validator(broken).validate('5411')).toThrow(DataLoadError);
    });
});

describe('validate and valid', () => {
    it('validate once with the given options', () => {
        expect(validate(collection, '7995', { denyCategories: ['gambling'] })).toEqual(['is in a denied category']);
        expect(validate(collection, '7995')).toEqual([]);
    });

    it('reports validity as a boolean', () => {
        expect(valid(collection, '5411')).toBe(true);
        expect(valid(collection, 'XXXX')).toBe(false);
    });
});
