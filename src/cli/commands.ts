/**
 * Command bodies for the objgraph CLI. Each returns the lines to print so the
 * commands can be exercised without a process around them.
 */

import * as fs from 'fs';
import { describeMessage, formatBytes, hexDump } from '../debug';
import { fromHex, toHex } from '../digest';
import { decodeRegistry, type Registry } from '../schema/Registry';
import { schemaToString } from '../schema/Schema';
import { logger } from '../utils/Logger';
import { loadVocabulary, registryFromVocabulary } from '../vocabulary';

const log = logger.child('cli');

export interface RegistryCommandOptions {
    out?: string;
}

/** Reference line, then one line per schema: name, schema reference, shape. */
export function describeRegistry(registry: Registry): string[] {
    const lines = [`registry ${toHex(registry.reference())} (${registry.size} schemas)`];
    for (const name of registry.names()) {
        const schema = registry.schemaByName(name);
        lines.push(`  ${name} ${toHex(registry.schemaReference(name))}`);
        lines.push(`    ${schemaToString(schema)}`);
    }
    return lines;
}

export function registryCommand(file: string, options: RegistryCommandOptions = {}): string[] {
    const vocabulary = loadVocabulary(fs.readFileSync(file, 'utf8'), file);
    const registry = registryFromVocabulary(vocabulary);
    if (options.out) {
        const encoded = registry.encode();
        fs.writeFileSync(options.out, encoded);
        log.info(`wrote ${formatBytes(encoded.length)} to ${options.out}`);
    }
    return describeRegistry(registry);
}

export function inspectCommand(file: string): string[] {
    const registry = decodeRegistry(new Uint8Array(fs.readFileSync(file)));
    return describeRegistry(registry);
}

export function messageCommand(hex: string): string[] {
    const frame = fromHex(hex.replace(/\s+/g, ''));
    return [describeMessage(frame), hexDump(frame)];
}
