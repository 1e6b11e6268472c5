import type { SatisfiesOptions } from '../types/index.js';
import { LicenseException, createUnknownLicenseError } from '../types/index.js';
import { equivalent } from '../lattice/predicates.js';
import { latticeToString } from '../lattice/printer.js';
import { parseExpression } from '../parser/index.js';
import { defaultRegistry } from '../license/registry.js';
import { exprToLattice } from '../license/translate.js';
import { satisfies } from '../license/satisfies.js';
import { expressionToString } from '../license/printer.js';
import { licEquals, licToString } from '../license/terms.js';

export const VERSION = '1.0.0';

export const HELP = `
License Lattice CLI v${VERSION}

Usage:
  license-lattice satisfies <package> <policy>   Check a package license against a policy
  license-lattice equivalent <a> <b>             Check two expressions for equivalence
  license-lattice parse <expression>             Print canonical form and lattice formula
  license-lattice ranges <license-id>            Print the or-later expansion of a license

Options:
  --help, -h         Show this help
  --version, -v      Show version

Exit codes:
  0  satisfied / equivalent / ok
  1  not satisfied / not equivalent
  2  invalid input

Examples:
  license-lattice satisfies "MIT OR GPL-2.0" "ISC AND MIT"
  license-lattice parse "GPL-2.0+ WITH Classpath-exception-2.0"
`;

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
}

const ARITY = new Map<string, number>([
    ['satisfies', 2],
    ['equivalent', 2],
    ['parse', 1],
    ['ranges', 1],
]);

const consoleIO: CliIO = {
    out: line => console.log(line),
    err: line => console.error(line),
};

/**
 * Run one CLI command and return its exit code
 */
export function runCli(args: string[], io: CliIO = consoleIO, options: SatisfiesOptions = {}): number {
    if (args.includes('--version') || args.includes('-v')) {
        io.out(VERSION);
        return 0;
    }

    const [commandName, ...operands] = args.filter(arg => !arg.startsWith('-') || arg === '-');
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        io.out(HELP);
        return 0;
    }

    try {
        return runCommand(commandName, operands, io, options);
    } catch (e) {
        if (e instanceof LicenseException) {
            io.err(`Error: ${e.message}`);
            if (e.error.suggestion) io.err(`Suggestion: ${e.error.suggestion}`);
            return 2;
        }
        throw e;
    }
}

function runCommand(commandName: string, operands: string[], io: CliIO, options: SatisfiesOptions): number {
    const arity = ARITY.get(commandName);
    if (arity === undefined) {
        io.err(`Unknown command: ${commandName}`);
        io.out(HELP);
        return 2;
    }
    if (operands.length !== arity) {
        io.err(`Error: '${commandName}' expects ${arity} argument${arity === 1 ? '' : 's'}, got ${operands.length}`);
        return 2;
    }

    const registry = options.registry ?? defaultRegistry;

    switch (commandName) {
        case 'satisfies': {
            const result = satisfies(operands[0], operands[1], options);
            io.out(String(result));
            return result ? 0 : 1;
        }
        case 'equivalent': {
            const a = exprToLattice(parseExpression(operands[0], { registry }), options);
            const b = exprToLattice(parseExpression(operands[1], { registry }), options);
            const result = equivalent(a, b, {
                equals: licEquals,
                warnThreshold: options.warnThreshold,
                onWarning: options.onWarning,
            });
            io.out(String(result));
            return result ? 0 : 1;
        }
        case 'parse': {
            const expr = parseExpression(operands[0], { registry });
            io.out(expressionToString(expr));
            io.out(`Lattice: ${latticeToString(exprToLattice(expr, options), licToString)}`);
            return 0;
        }
        default: {
            // ranges
            const id = registry.mkLicenseId(operands[0]);
            if (id === undefined) {
                throw createUnknownLicenseError(operands[0]);
            }
            const members = options.ranges ? options.ranges(id) : registry.lookupLicenseRange(id);
            for (const member of members) {
                const osi = registry.isOsiApproved(member) ? ' (OSI approved)' : '';
                io.out(`${member}${osi}`);
            }
            return 0;
        }
    }
}
