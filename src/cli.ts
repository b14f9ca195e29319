#!/usr/bin/env node
import cac from 'cac';
import { version } from '../package.json';
import { inspectCommand, messageCommand, registryCommand } from './cli/commands';
import { applyConfig, loadConfig } from './config';
import { GraphError } from './errors';
import { logger } from './utils/Logger';

const cli = cac('objgraph');

cli
    .command('registry <vocabulary>', 'Build a registry from a YAML or JSON vocabulary file')
    .option('--out <file>', 'Write the encoded registry to <file>')
    .action((vocabulary: string, options: { out?: string }) => {
        run(() => registryCommand(vocabulary, options));
    });

cli
    .command('inspect <registry-file>', 'Decode an encoded registry and print its schemas')
    .action((file: string) => {
        run(() => inspectCommand(file));
    });

cli
    .command('message <hex>', 'Decode a hex-encoded message frame')
    .action((hex: string) => {
        run(() => messageCommand(String(hex)));
    });

cli.help();
cli.version(version);

try {
    applyConfig(loadConfig(process.env), logger);
    cli.parse();
} catch (e) {
    fail(e);
}

function run(command: () => string[]): void {
    try {
        for (const line of command()) {
            console.log(line);
        }
    } catch (e) {
        fail(e);
    }
}

function fail(e: unknown): void {
    if (e instanceof GraphError) {
        logger.error(`${e.code}: ${e.message}`);
    } else {
        logger.error(e instanceof Error ? e.message : String(e));
    }
    process.exitCode = 1;
}
