/**
 * Tests for command-line argument parsing
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { positiveInt } from '../args.js';
import { registerProductionCommands } from '../commands/production.js';
import { registerVariantCommands } from '../commands/variants.js';

function testProgram(): { program: Command; stderr: string[] } {
    const stderr: string[] = [];
    const program = new Command()
        .exitOverride()
        .configureOutput({ writeErr: (text) => stderr.push(text), writeOut: () => undefined });
    registerVariantCommands(program);
    registerProductionCommands(program);
    return { program, stderr };
}

async function parseError(program: Command, args: string[]): Promise<unknown> {
    return program.parseAsync(args, { from: 'user' }).then(
        () => null,
        (err: unknown) => err
    );
}

describe('positiveInt', () => {
    it('parses positive whole numbers', () => {
        expect(positiveInt('3')).toBe(3);
        expect(positiveInt('120')).toBe(120);
    });

    it.each(['0', '-2', '1.5', 'abc', ''])('rejects "%s" as an invalid argument', (value) => {
        expect(() => positiveInt(value)).toThrow(InvalidArgumentError);
        expect(() => positiveInt(value)).toThrow('Expected a positive whole number.');
    });
});

describe('usage errors', () => {
    it('reports a bad option value without a stack trace', async () => {
        const { program, stderr } = testProgram();

        const err = await parseError(program, ['variants', 'catalog.json', '--abbrev', 'x']);

        expect(err).toBeInstanceOf(CommanderError);
        expect(err).toMatchObject({ code: 'commander.invalidArgument', exitCode: 1 });
        expect(stderr.join('')).toBe(
            "error: option '--abbrev <n>' argument 'x' is invalid. Expected a positive whole number.\n"
        );
    });

    it('reports a bad unit count before the batch is planned', async () => {
        const { program, stderr } = testProgram();

        const err = await parseError(program, ['plan-batch', 'catalog.json', 'BAG-BLA-MED', '0']);

        expect(err).toMatchObject({ code: 'commander.invalidArgument' });
        expect(stderr.join('')).toBe(
            "error: command-argument value '0' is invalid for argument 'units'. Expected a positive whole number.\n"
        );
    });
});
