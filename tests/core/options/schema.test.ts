import { describe, it, expect } from 'vitest';

import {
    parseCheckText,
    parseSpinText,
    splitChoices,
    validateComboDeclaration,
    validateSpinDeclaration,
} from '../../../src/core/options/schema.js';
import { OptionDeclarationError } from '../../../src/core/options/errors.js';

describe('options: schema', () => {

    describe('parseCheckText', () => {

        it('should parse true and false', () => {

            expect(parseCheckText('true')).toBe(true);
            expect(parseCheckText('false')).toBe(false);

        });

        it('should return null for anything else', () => {

            expect(parseCheckText('True')).toBeNull();
            expect(parseCheckText('1')).toBeNull();
            expect(parseCheckText('')).toBeNull();

        });

    });

    describe('parseSpinText', () => {

        it('should parse signed integers', () => {

            expect(parseSpinText('64')).toBe(64);
            expect(parseSpinText('-100')).toBe(-100);
            expect(parseSpinText('+7')).toBe(7);

        });

        it('should return null for non-integers', () => {

            expect(parseSpinText('6.5')).toBeNull();
            expect(parseSpinText(' 64')).toBeNull();
            expect(parseSpinText('1e3')).toBeNull();
            expect(parseSpinText('')).toBeNull();

        });

        it('should return null past the safe integer range', () => {

            expect(parseSpinText('99999999999999999999')).toBeNull();

        });

    });

    describe('splitChoices', () => {

        it('should drop separators and blanks', () => {

            expect(splitChoices('  Both var Off\tvar  White ')).toEqual(['Both', 'Off', 'White']);

        });

        it('should drop separators in any case', () => {

            expect(splitChoices('A VAR B Var C')).toEqual(['A', 'B', 'C']);

        });

        it('should return nothing for an empty list', () => {

            expect(splitChoices('')).toEqual([]);

        });

    });

    describe('validateSpinDeclaration', () => {

        it('should return a valid declaration', () => {

            expect(validateSpinDeclaration({ value: 1, min: 1, max: 512 })).toEqual({ value: 1, min: 1, max: 512 });

        });

        it('should report crossed bounds', () => {

            expect(() => validateSpinDeclaration({ value: 1, min: 2, max: 1 })).toThrow(
                'Invalid spin option: Minimum must not exceed maximum',
            );

        });

    });

    describe('validateComboDeclaration', () => {

        it('should reject a list without choices', () => {

            expect(() => validateComboDeclaration({ choices: [], initial: 'A' })).toThrow(OptionDeclarationError);

        });

        it('should accept an initial value in any case', () => {

            expect(validateComboDeclaration({ choices: ['Both', 'Off'], initial: 'OFF' })).toEqual({
                choices: ['Both', 'Off'],
                initial: 'OFF',
            });

        });

    });

});
