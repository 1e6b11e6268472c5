/**
 * Package license against policy satisfaction
 */

import { satisfies } from '../src/license/satisfies.js';
import { parseExpression } from '../src/parser/index.js';
import { LicenseException } from '../src/types/index.js';

describe('satisfies', () => {
    test.each([
        ['Zlib', 'ISC AND MIT AND Zlib', true],
        ['GPL-3.0', 'ISC AND MIT', false],
        ['MIT OR GPL-2.0', 'ISC AND MIT', true],
        ['MIT AND GPL-2.0', 'MIT AND GPL-2.0', true],
        ['MIT AND GPL-2.0', 'ISC AND GPL-2.0', false],
    ])('%s against policy %s is %s', (pkg, policy, expected) => {
        expect(satisfies(pkg, policy)).toBe(expected);
    });

    test('a policy offering alternatives is not below a single one of them', () => {
        expect(satisfies('Zlib', 'ISC OR MIT OR Zlib')).toBe(false);
    });

    test('an identical single license satisfies itself', () => {
        expect(satisfies('Apache-2.0', 'apache-2.0')).toBe(true);
    });

    test('accepts parsed expressions', () => {
        expect(satisfies(parseExpression('MIT OR GPL-2.0'), parseExpression('ISC AND MIT'))).toBe(true);
    });

    describe('or-later ranges', () => {
        test('a later member is below the open range', () => {
            expect(satisfies('GPL-2.0+', 'GPL-3.0')).toBe(true);
        });

        test('the open range is not below one member', () => {
            expect(satisfies('GPL-3.0', 'GPL-2.0+')).toBe(false);
            expect(satisfies('GPL-2.0', 'GPL-2.0+')).toBe(false);
        });

        test('a wider range contains a narrower one', () => {
            expect(satisfies('LGPL-2.0+', 'LGPL-2.1+')).toBe(true);
            expect(satisfies('LGPL-2.1+', 'LGPL-2.0+')).toBe(false);
        });

        test('uses a supplied range table', () => {
            const ranges = (id: string): string[] => id === 'MIT' ? ['MIT', 'ISC'] : [id];
            expect(satisfies('MIT+', 'ISC', { ranges })).toBe(true);
            expect(satisfies('MIT+', 'ISC')).toBe(false);
        });
    });

    describe('exceptions', () => {
        test('a license with an exception is a distinct term', () => {
            expect(satisfies('GPL-2.0 WITH Classpath-exception-2.0', 'GPL-2.0')).toBe(false);
            expect(satisfies('GPL-2.0', 'GPL-2.0 WITH Classpath-exception-2.0')).toBe(false);
        });

        test('matching exceptions satisfy', () => {
            expect(satisfies('GPL-2.0+ WITH Classpath-exception-2.0', 'GPL-3.0 WITH Classpath-exception-2.0')).toBe(true);
        });
    });

    describe('license references', () => {
        test('a reference satisfies itself', () => {
            expect(satisfies('LicenseRef-custom', 'LicenseRef-custom')).toBe(true);
        });

        test('or-later on a reference is the reference itself', () => {
            expect(satisfies('LicenseRef-custom+', 'LicenseRef-custom')).toBe(true);
            expect(satisfies('LicenseRef-custom', 'LicenseRef-custom+')).toBe(true);
        });

        test('document qualification distinguishes references', () => {
            expect(satisfies('DocumentRef-a:LicenseRef-x', 'LicenseRef-x')).toBe(false);
        });

        test('a reference never matches a registered license', () => {
            expect(satisfies('LicenseRef-MIT', 'MIT')).toBe(false);
        });
    });

    test('propagates parse errors', () => {
        expect(() => satisfies('MIT AND', 'MIT')).toThrow(LicenseException);
    });

    test('reports expensive comparisons', () => {
        const onWarning = jest.fn();

        satisfies('MIT', 'ISC', { warnThreshold: 1, onWarning });

        expect(onWarning).toHaveBeenCalledTimes(1);
        expect(onWarning).toHaveBeenCalledWith(
            'Lattice comparison over 2 distinct variables (threshold 1); search is exponential in this count'
        );
    });
});
