/**
 * CLI command tests
 */

import { runCli, HELP, VERSION } from '../src/cli/run.js';
import type { CliIO } from '../src/cli/run.js';

function capture(): CliIO & { stdout: string[]; stderr: string[] } {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        stdout,
        stderr,
        out: line => stdout.push(line),
        err: line => stderr.push(line),
    };
}

describe('runCli', () => {
    test('satisfies prints true and exits 0', () => {
        const io = capture();

        expect(runCli(['satisfies', 'MIT OR GPL-2.0', 'ISC AND MIT'], io)).toBe(0);
        expect(io.stdout).toEqual(['true']);
    });

    test('satisfies prints false and exits 1', () => {
        const io = capture();

        expect(runCli(['satisfies', 'GPL-3.0', 'ISC AND MIT'], io)).toBe(1);
        expect(io.stdout).toEqual(['false']);
    });

    test('equivalent compares two expressions', () => {
        const io = capture();

        expect(runCli(['equivalent', 'MIT AND ISC', 'isc and mit'], io)).toBe(0);
        expect(runCli(['equivalent', 'MIT', 'MIT OR ISC'], io)).toBe(1);
        expect(io.stdout).toEqual(['true', 'false']);
    });

    test('parse prints canonical text and the lattice formula', () => {
        const io = capture();

        expect(runCli(['parse', 'gpl-2.0+ with classpath-exception-2.0'], io)).toBe(0);
        expect(io.stdout).toEqual([
            'GPL-2.0+ WITH Classpath-exception-2.0',
            'Lattice: (GPL-2.0 WITH Classpath-exception-2.0 ∨ GPL-3.0 WITH Classpath-exception-2.0)',
        ]);
    });

    test('ranges lists family members with OSI approval', () => {
        const io = capture();

        expect(runCli(['ranges', 'lgpl-2.0'], io)).toBe(0);
        expect(io.stdout).toEqual([
            'LGPL-2.0 (OSI approved)',
            'LGPL-2.1 (OSI approved)',
            'LGPL-3.0 (OSI approved)',
        ]);
    });

    test('ranges marks licenses without OSI approval', () => {
        const io = capture();

        runCli(['ranges', 'CC-BY-3.0'], io);
        expect(io.stdout).toEqual(['CC-BY-3.0', 'CC-BY-4.0']);
    });

    test('reports unknown licenses with a suggestion and exits 2', () => {
        const io = capture();

        expect(runCli(['ranges', 'BOGUS'], io)).toBe(2);
        expect(io.stderr).toEqual([
            "Error: Unknown license identifier 'BOGUS'",
            "Suggestion: Use 'LicenseRef-BOGUS' for licenses that are not registered",
        ]);
    });

    test('reports syntax errors', () => {
        const io = capture();

        expect(runCli(['parse', 'MIT &'], io)).toBe(2);
        expect(io.stderr).toEqual([
            "Error: Unexpected character '&'",
            "Suggestion: Use 'AND' and 'OR' instead of '&' and '|'",
        ]);
    });

    test('checks argument count', () => {
        const io = capture();

        expect(runCli(['satisfies', 'MIT'], io)).toBe(2);
        expect(io.stderr).toEqual(["Error: 'satisfies' expects 2 arguments, got 1"]);
    });

    test('rejects unknown commands', () => {
        const io = capture();

        expect(runCli(['frobnicate'], io)).toBe(2);
        expect(io.stderr).toEqual(['Unknown command: frobnicate']);
        expect(io.stdout).toEqual([HELP]);
    });

    test('prints version and help', () => {
        const io = capture();

        expect(runCli(['--version'], io)).toBe(0);
        expect(runCli([], io)).toBe(0);
        expect(io.stdout).toEqual([VERSION, HELP]);
    });
});
