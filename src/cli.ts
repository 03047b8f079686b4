import { Command, InvalidArgumentError } from 'commander';
import { convertMarkdownFile } from './convert.js';
import type { ConversionEngine } from './docx/types.js';
import { describeError, exitCodeFor } from './errors.js';
import { logToStderr } from './utils/logger.js';

const ENGINES: readonly ConversionEngine[] = ['auto', 'builtin', 'pandoc'];

function parseEngine(value: string): ConversionEngine {
    const engine = ENGINES.find((candidate) => candidate === value);
    if (!engine) {
        throw new InvalidArgumentError(`expected one of ${ENGINES.join(', ')}`);
    }
    return engine;
}

interface CliOptions {
    output?: string;
    header?: string;
    config?: string;
    engine: ConversionEngine;
}

export function createProgram(): Command {
    return new Command()
        .name('md2docx')
        .description('Convert Markdown to a .docx or .doc file with an academic page layout')
        .argument('<input>', 'input Markdown file')
        .option('-o, --output <file>', 'output path (.docx or .doc)')
        .option('--header <text>', 'page header text')
        .option('--config <file>', 'style config file (YAML or JSON)')
        .option('--engine <engine>', 'auto, builtin or pandoc', parseEngine, 'auto');
}

export async function main(argv: string[]): Promise<number> {
    const program = createProgram();
    program.parse(argv, { from: 'user' });
    const [input] = program.args;
    const opts = program.opts<CliOptions>();

    try {
        const result = await convertMarkdownFile({ input, ...opts });
        process.stdout.write(`Conversion complete: ${result.outputPath}\n`);
        return 0;
    } catch (error) {
        logToStderr('error', describeError(error));
        return exitCodeFor(error);
    }
}
