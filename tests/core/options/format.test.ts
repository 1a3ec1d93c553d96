import { describe, it, expect } from 'vitest';

import {
    describeOption,
    describeRegistry,
    formatOption,
    formatRegistry,
} from '../../../src/core/options/format.js';
import { OptionsRegistry } from '../../../src/core/options/registry.js';
import {
    buttonOption,
    checkOption,
    comboOption,
    spinOption,
    stringOption,
} from '../../../src/core/options/option.js';

describe('options: format', () => {

    describe('formatOption', () => {

        it('should render a spin with default, min and max', () => {

            expect(formatOption('Hash', spinOption(16, 1, 33554432))).toBe(
                'option name Hash type spin default 16 min 1 max 33554432',
            );

        });

        it('should render a negative spin range', () => {

            expect(formatOption('Contempt', spinOption(24, -100, 100))).toBe(
                'option name Contempt type spin default 24 min -100 max 100',
            );

        });

        it('should render a check with its default', () => {

            expect(formatOption('Ponder', checkOption(false))).toBe(
                'option name Ponder type check default false',
            );

        });

        it('should render a string with its default', () => {

            expect(formatOption('SyzygyPath', stringOption('<empty>'))).toBe(
                'option name SyzygyPath type string default <empty>',
            );

        });

        it('should render an empty string default', () => {

            expect(formatOption('Debug Log File', stringOption(''))).toBe(
                'option name Debug Log File type string default ',
            );

        });

        it('should render a combo with its full list', () => {

            expect(formatOption('Analysis Contempt', comboOption('Both var Off var White var Black var Both', 'Both'))).toBe(
                'option name Analysis Contempt type combo default Both var Off var White var Black var Both',
            );

        });

        it('should render a button without a default', () => {

            expect(formatOption('Clear Hash', buttonOption())).toBe('option name Clear Hash type button');

        });

        it('should render the default, not the current value', () => {

            const option = spinOption(16, 1, 1024);

            option.write('512');

            expect(formatOption('Hash', option)).toBe('option name Hash type spin default 16 min 1 max 1024');

        });

    });

    describe('formatRegistry', () => {

        it('should render options in declaration order', () => {

            const registry = new OptionsRegistry();

            registry.declare('Threads', spinOption(1, 1, 512));
            registry.declare('Clear Hash', buttonOption());
            registry.declare('Ponder', checkOption(false));

            expect(formatRegistry(registry)).toBe([
                'option name Threads type spin default 1 min 1 max 512',
                'option name Clear Hash type button',
                'option name Ponder type check default false',
            ].join('\n'));

        });

        it('should render an empty registry as an empty string', () => {

            expect(formatRegistry(new OptionsRegistry())).toBe('');

        });

    });

    describe('describeOption', () => {

        it('should describe a spin', () => {

            const option = spinOption(16, 1, 1024);

            option.bindRank(4);
            option.write('64');

            expect(describeOption('Hash', option)).toEqual({
                name: 'Hash',
                kind: 'spin',
                rank: 4,
                value: '64',
                default: '16',
                min: 1,
                max: 1024,
            });

        });

        it('should describe a combo with its choices', () => {

            const option = comboOption('Both var Off', 'Off');

            expect(describeOption('Analysis Contempt', option)).toEqual({
                name: 'Analysis Contempt',
                kind: 'combo',
                rank: -1,
                value: 'Off',
                default: 'Both var Off',
                choices: ['Both', 'Off'],
            });

        });

        it('should describe a button without a default', () => {

            expect(describeOption('Clear Hash', buttonOption())).toEqual({
                name: 'Clear Hash',
                kind: 'button',
                rank: -1,
                value: '',
            });

        });

    });

    describe('describeRegistry', () => {

        it('should describe options in declaration order', () => {

            const registry = new OptionsRegistry();

            registry.declare('Ponder', checkOption(false));
            registry.declare('EvalFile', stringOption('nn-default.nnue'));

            expect(describeRegistry(registry).map((d) => [d.name, d.rank])).toEqual([
                ['Ponder', 0],
                ['EvalFile', 1],
            ]);

        });

    });

});
